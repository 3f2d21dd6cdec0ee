import type { Document } from "@promptline/core";

// ─── Retrieval strategy capability ─────────────────────────────────────────────

export interface RetrieveOptions {
  signal?: AbortSignal;
}

/**
 * Turns a query into relevance-ordered documents, most relevant first.
 * An empty list means "no context", not a failure. Implementations must not
 * mutate the query and must return the same documents for the same query and
 * strategy state.
 */
export interface RetrievalStrategy {
  readonly name: string;
  retrieve(query: string, options?: RetrieveOptions): readonly Document[] | Promise<readonly Document[]>;
}
