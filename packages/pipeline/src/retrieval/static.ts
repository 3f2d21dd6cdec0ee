import type { Document } from "@promptline/core";
import type { RetrievalStrategy } from "./types.js";

// ─── Static strategy ───────────────────────────────────────────────────────────
// Same documents for every query. Useful as a baseline and in tests.

export class StaticStrategy implements RetrievalStrategy {
  readonly name = "static";
  private readonly documents: readonly Document[];

  constructor(documents: readonly Document[] = []) {
    this.documents = [...documents];
  }

  retrieve(): readonly Document[] {
    return this.documents;
  }
}
