import { z } from "zod";

// ─── Document schema ───────────────────────────────────────────────────────────

export const DocumentSchema = z.object({
  id: z.string(),
  text: z.string(),
  score: z.number().optional(),
});

export type Document = z.infer<typeof DocumentSchema>;

// ─── Few-shot example schema ───────────────────────────────────────────────────

export const ExampleSchema = z.object({
  input: z.string(),
  output: z.string(),
});

export type Example = z.infer<typeof ExampleSchema>;

// ─── Request schema ────────────────────────────────────────────────────────────

export const TEMPERATURE_MIN = 0;
export const TEMPERATURE_MAX = 2;

export const RequestSchema = z.object({
  promptText: z.string().min(1, "promptText must not be empty"),
  temperature: z
    .number()
    .finite()
    .min(TEMPERATURE_MIN, `temperature must be >= ${TEMPERATURE_MIN}`)
    .max(TEMPERATURE_MAX, `temperature must be <= ${TEMPERATURE_MAX}`),
  maxTokens: z.number().int("maxTokens must be an integer").positive("maxTokens must be > 0"),
});

export type Request = z.infer<typeof RequestSchema>;

// ─── Result schema ─────────────────────────────────────────────────────────────

export const ResultSchema = z.object({
  text: z.string(),
  raw: z.unknown(),
});

// z.unknown() infers as optional; a Result always carries its raw payload.
export interface Result {
  text: string;
  raw: unknown;
}

// ─── Utility: freeze records ───────────────────────────────────────────────────

export function createDocument(id: string, text: string, score?: number): Readonly<Document> {
  return Object.freeze(score === undefined ? { id, text } : { id, text, score });
}

export function createExample(input: string, output: string): Readonly<Example> {
  return Object.freeze({ input, output });
}
