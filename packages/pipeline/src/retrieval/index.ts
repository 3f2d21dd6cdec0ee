export type { RetrievalStrategy, RetrieveOptions } from "./types.js";
export { StrategyContext, type ContextRetrieveOptions } from "./context.js";
export { StaticStrategy } from "./static.js";
export { KeywordStrategy, tokenize, type KeywordStrategyOptions } from "./keyword.js";
