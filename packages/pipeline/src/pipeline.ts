import {
  throwIfCancelled,
  withDeadline,
  type Example,
  type PipelineConfig,
  type Result,
} from "@promptline/core";
import type { AdapterRegistry } from "./adapter-registry.js";
import { formatContext, type ContextFormatter } from "./context-format.js";
import { Notifier } from "./notifier.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, RequestBuilder } from "./request-builder.js";
import { StrategyContext } from "./retrieval/context.js";
import type { RetrievalStrategy } from "./retrieval/types.js";

export interface PipelineOptions {
  registry: AdapterRegistry;
  strategies: StrategyContext;
  notifier?: Notifier<Result>;
  formatter?: ContextFormatter;
  /** Few-shot examples prepended to every request */
  examples?: readonly Example[];
  defaults?: Partial<Pick<PipelineConfig, "temperature" | "maxTokens" | "timeoutMs" | "debug">>;
}

export interface HandleOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  examples?: readonly Example[];
  temperature?: number;
  maxTokens?: number;
}

// ─── Pipeline ──────────────────────────────────────────────────────────────────
// retrieve → build → invoke → publish. Any failure before publish aborts the
// request; nothing is published for it.

export class Pipeline {
  readonly registry: AdapterRegistry;
  readonly strategies: StrategyContext;
  readonly notifier: Notifier<Result>;
  private formatter: ContextFormatter;
  private examples: readonly Example[];
  private temperature: number;
  private maxTokens: number;
  private timeoutMs: number | undefined;
  private debug: boolean;

  constructor(options: PipelineOptions) {
    this.registry = options.registry;
    this.strategies = options.strategies;
    this.notifier = options.notifier ?? new Notifier<Result>();
    this.formatter = options.formatter ?? formatContext;
    this.examples = [...(options.examples ?? [])];
    this.temperature = options.defaults?.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.defaults?.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeoutMs = options.defaults?.timeoutMs;
    this.debug = options.defaults?.debug ?? false;
  }

  setStrategy(strategy: RetrievalStrategy): void {
    this.strategies.setStrategy(strategy);
  }

  async handle(query: string, modelId: string, options: HandleOptions = {}): Promise<Result> {
    return withDeadline(
      async (signal) => {
        const documents = await this.strategies.retrieve(query, { signal });
        this.log(`retrieved ${documents.length} document(s) for model ${modelId}`);

        const request = new RequestBuilder()
          .setContext(documents, this.formatter)
          .addExamples(this.examples)
          .addExamples(options.examples ?? [])
          .setPrompt(query)
          .setTemperature(options.temperature ?? this.temperature)
          .setMaxTokens(options.maxTokens ?? this.maxTokens)
          .build();
        this.log(`built request (${request.promptText.length} chars)`);

        const result = await this.registry.invoke(modelId, request.promptText, {
          signal,
          temperature: request.temperature,
          maxTokens: request.maxTokens,
        });
        throwIfCancelled(signal, "handle");

        const outcome = this.notifier.publish(result);
        this.log(`published to ${outcome.delivered} observer(s), ${outcome.failures.length} failed`);
        return result;
      },
      {
        signal: options.signal,
        timeoutMs: options.timeoutMs ?? this.timeoutMs,
        label: "handle",
      }
    );
  }

  private log(message: string): void {
    if (this.debug) console.log(`[pipeline] ${message}`);
  }
}
