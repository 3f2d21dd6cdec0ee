import { z } from "zod";
import { existsSync, readFileSync, mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { homedir } from "os";
import { ConfigError } from "./errors.js";
import { ExampleSchema, TEMPERATURE_MAX, TEMPERATURE_MIN } from "./schemas.js";

// ─── Config schema ─────────────────────────────────────────────────────────────

export const PipelineConfigSchema = z.object({
  model: z.string().default("echo"),
  temperature: z.number().min(TEMPERATURE_MIN).max(TEMPERATURE_MAX).default(1),
  maxTokens: z.number().int().positive().default(100),
  timeoutMs: z.number().int().positive().default(30_000),
  debug: z.boolean().default(false),
  // Few-shot examples prepended to every request
  examples: z.array(ExampleSchema).default([]),
});

export const RetrievalConfigSchema = z.object({
  strategy: z.enum(["none", "keyword"]).default("none"),
  corpusPath: z.string().optional(),
  topK: z.number().int().positive().default(3),
});

const ProviderConfigSchema = (defaultModel: string) =>
  z.object({
    model: z.string().default(defaultModel),
  });

export const ModelsConfigSchema = z.object({
  anthropic: ProviderConfigSchema("claude-3-5-haiku-latest").default({}),
  openai: ProviderConfigSchema("gpt-4o-mini").default({}),
  deepseek: ProviderConfigSchema("deepseek-chat").default({}),
  zhipu: ProviderConfigSchema("glm-4-flash").default({}),
  // Per-provider API keys (optional; env vars take priority)
  apiKeys: z
    .object({
      anthropic: z.string().optional(),
      openai: z.string().optional(),
      deepseek: z.string().optional(),
      zhipu: z.string().optional(),
    })
    .optional(),
});

export const ConfigSchema = z.object({
  pipeline: PipelineConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  models: ModelsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;

// ─── Config file path ──────────────────────────────────────────────────────────

export function getConfigDir(): string {
  return join(homedir(), ".promptline");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "promptline.json");
}

// ─── Load config ───────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Config file to read instead of ~/.promptline/promptline.json */
  path?: string;
  /** Environment to overlay; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.path ?? getConfigPath();
  const env = options.env ?? process.env;
  let raw: Record<string, unknown> = {};

  if (existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(configPath, "utf8"));
      if (isPlainObject(parsed)) {
        raw = parsed;
      } else {
        console.warn(`[config] ${configPath} is not a JSON object, using defaults`);
      }
    } catch (err) {
      console.warn(
        `[config] Could not read ${configPath}, using defaults:`,
        err instanceof Error ? err.message : String(err)
      );
    }
  }

  // Overlay environment variables
  const merged = deepMerge(raw, {
    pipeline: {
      ...(env.PROMPTLINE_MODEL ? { model: env.PROMPTLINE_MODEL } : {}),
      ...(env.PROMPTLINE_TIMEOUT_MS
        ? { timeoutMs: parseInt(env.PROMPTLINE_TIMEOUT_MS, 10) }
        : {}),
      ...(env.PROMPTLINE_DEBUG ? { debug: env.PROMPTLINE_DEBUG === "1" || env.PROMPTLINE_DEBUG === "true" } : {}),
    },
    models: {
      apiKeys: {
        ...(env.ANTHROPIC_API_KEY ? { anthropic: env.ANTHROPIC_API_KEY } : {}),
        ...(env.OPENAI_API_KEY ? { openai: env.OPENAI_API_KEY } : {}),
        ...(env.DEEPSEEK_API_KEY ? { deepseek: env.DEEPSEEK_API_KEY } : {}),
        ...(env.ZHIPU_API_KEY ? { zhipu: env.ZHIPU_API_KEY } : {}),
      },
    },
  });

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration in ${configPath}: ${issues.join("; ")}`);
  }
  return result.data;
}

// ─── Save config ───────────────────────────────────────────────────────────────

export function saveConfig(config: Config, path = getConfigPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, JSON.stringify(config, null, 2), "utf8");
}

// ─── Deep merge helper ─────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sv = source[key];
    const tv = target[key];
    if (isPlainObject(sv) && isPlainObject(tv)) {
      result[key] = deepMerge(tv, sv);
    } else if (sv !== undefined && sv !== null && sv !== "") {
      result[key] = sv;
    }
  }
  return result;
}
