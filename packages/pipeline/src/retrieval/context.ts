import {
  DocumentSchema,
  RetrievalError,
  TimeoutError,
  withDeadline,
  type Document,
} from "@promptline/core";
import type { RetrievalStrategy } from "./types.js";

export interface ContextRetrieveOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

// ─── Strategy Context ──────────────────────────────────────────────────────────
// Holds exactly one active strategy. A swap only affects retrievals that start
// after it; in-flight calls keep the instance they started with.

export class StrategyContext {
  constructor(private strategy: RetrievalStrategy) {}

  setStrategy(strategy: RetrievalStrategy): void {
    this.strategy = strategy;
  }

  getStrategy(): RetrievalStrategy {
    return this.strategy;
  }

  async retrieve(query: string, options: ContextRetrieveOptions = {}): Promise<readonly Document[]> {
    const strategy = this.strategy;

    const documents = await withDeadline(
      async (signal) => {
        try {
          return await strategy.retrieve(query, { signal });
        } catch (err) {
          if (err instanceof RetrievalError || err instanceof TimeoutError) throw err;
          throw new RetrievalError(`Strategy "${strategy.name}" failed to retrieve`, err);
        }
      },
      { signal: options.signal, timeoutMs: options.timeoutMs, label: `retrieve(${strategy.name})` }
    );

    return Object.freeze(documents.map((doc, index) => snapshot(strategy.name, doc, index)));
  }
}

function snapshot(strategyName: string, doc: unknown, index: number): Readonly<Document> {
  const parsed = DocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new RetrievalError(
      `Strategy "${strategyName}" returned an invalid document at position ${index}`,
      parsed.error
    );
  }
  return Object.freeze(parsed.data);
}
