import type { Document } from "@promptline/core";

// ─── Context formatting policy ─────────────────────────────────────────────────
// Turns retrieved documents into a preamble placed before the prompt. An empty
// preamble leaves the prompt untouched.

export type ContextFormatter = (documents: readonly Document[]) => string;

export const formatContext: ContextFormatter = (documents) => {
  if (documents.length === 0) return "";
  const lines = documents.map((doc, i) => `[${i + 1}] ${doc.text}`);
  return `Context:\n${lines.join("\n")}`;
};
