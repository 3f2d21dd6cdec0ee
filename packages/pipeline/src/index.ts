export {
  AdapterRegistry,
  type AdapterBinding,
  type Backend,
  type BackendReply,
  type GenerateFn,
  type GenerateOptions,
  type InvokeOptions,
} from "./adapter-registry.js";
export * from "./retrieval/index.js";
export { formatContext, type ContextFormatter } from "./context-format.js";
export { RequestBuilder, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from "./request-builder.js";
export { Notifier, type Observer, type PublishOutcome, type NotifierOptions } from "./notifier.js";
export { Pipeline, type PipelineOptions, type HandleOptions } from "./pipeline.js";
