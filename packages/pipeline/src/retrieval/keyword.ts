import { createDocument, type Document } from "@promptline/core";
import type { RetrievalStrategy } from "./types.js";

// ─── Keyword strategy ──────────────────────────────────────────────────────────
// Scores each corpus document by the share of distinct query terms it contains.

export interface KeywordStrategyOptions {
  /** Maximum documents returned (default 3) */
  topK?: number;
  /** Documents scoring below this are dropped; zero-score documents always are */
  minScore?: number;
}

export class KeywordStrategy implements RetrievalStrategy {
  readonly name = "keyword";
  private readonly corpus: ReadonlyArray<{ doc: Document; terms: Set<string> }>;
  private readonly topK: number;
  private readonly minScore: number;

  constructor(corpus: readonly Document[], options: KeywordStrategyOptions = {}) {
    this.corpus = corpus.map((doc) => ({ doc, terms: new Set(tokenize(doc.text)) }));
    this.topK = options.topK ?? 3;
    if (!Number.isInteger(this.topK) || this.topK <= 0) {
      throw new RangeError(`topK must be a positive integer, got ${this.topK}`);
    }
    this.minScore = options.minScore ?? 0;
  }

  retrieve(query: string): Document[] {
    const queryTerms = Array.from(new Set(tokenize(query)));
    if (queryTerms.length === 0) return [];

    const scored: Array<{ doc: Document; score: number; position: number }> = [];
    this.corpus.forEach(({ doc, terms }, position) => {
      const hits = queryTerms.filter((t) => terms.has(t)).length;
      const score = hits / queryTerms.length;
      if (score > 0 && score >= this.minScore) {
        scored.push({ doc, score, position });
      }
    });

    return scored
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, this.topK)
      .map(({ doc, score }) => createDocument(doc.id, doc.text, score));
  }
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length > 0);
}
