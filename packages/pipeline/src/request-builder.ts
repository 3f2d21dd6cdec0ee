import {
  InvalidRequestError,
  RequestSchema,
  createExample,
  type Document,
  type Example,
  type Request,
} from "@promptline/core";
import { formatContext, type ContextFormatter } from "./context-format.js";

export const DEFAULT_TEMPERATURE = 1.0;
export const DEFAULT_MAX_TOKENS = 100;

// ─── Request Builder ───────────────────────────────────────────────────────────

/**
 * Accumulates prompt settings and produces immutable {@link Request} values.
 *
 * Setters return the builder for chaining. Scalar setters overwrite, example
 * setters append. `build()` leaves the builder as it was, so one builder can
 * serve as a recipe for many requests.
 *
 * With examples, the prompt becomes a few-shot transcript:
 *
 * ```
 * Input: Q1
 * Output: A1
 *
 * Input: Q3
 * Output:
 * ```
 */
export class RequestBuilder {
  private prompt = "";
  private temperature = DEFAULT_TEMPERATURE;
  private maxTokens = DEFAULT_MAX_TOKENS;
  private examples: Readonly<Example>[] = [];
  private documents: readonly Document[] = [];
  private formatter: ContextFormatter = formatContext;

  setPrompt(text: string): this {
    this.prompt = text;
    return this;
  }

  setTemperature(temperature: number): this {
    this.temperature = temperature;
    return this;
  }

  setMaxTokens(maxTokens: number): this {
    this.maxTokens = maxTokens;
    return this;
  }

  addExample(input: string, output: string): this {
    this.examples.push(createExample(input, output));
    return this;
  }

  addExamples(examples: readonly Example[]): this {
    for (const ex of examples) {
      this.addExample(ex.input, ex.output);
    }
    return this;
  }

  /** Attach retrieved documents; the list is copied, later edits to it are not seen. */
  setContext(documents: readonly Document[], formatter: ContextFormatter = this.formatter): this {
    this.documents = documents.map((doc) => Object.freeze({ ...doc }));
    this.formatter = formatter;
    return this;
  }

  build(): Request {
    if (this.prompt === "") {
      throw new InvalidRequestError(["prompt must be set to a non-empty string"]);
    }

    const parsed = RequestSchema.safeParse({
      promptText: this.renderPrompt(),
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });
    if (!parsed.success) {
      throw new InvalidRequestError(parsed.error.issues.map((issue) => issue.message));
    }
    return Object.freeze(parsed.data);
  }

  private renderPrompt(): string {
    const preamble = this.documents.length > 0 ? this.formatter(this.documents) : "";
    const sections = preamble ? [preamble] : [];

    if (this.examples.length === 0) {
      sections.push(this.prompt);
    } else {
      for (const ex of this.examples) {
        sections.push(`Input: ${ex.input}\nOutput: ${ex.output}`);
      }
      sections.push(`Input: ${this.prompt}\nOutput:`);
    }
    return sections.join("\n\n");
  }
}
