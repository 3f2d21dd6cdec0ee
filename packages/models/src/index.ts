export { AnthropicBackend, type AnthropicBackendOptions } from "./anthropic.js";
export {
  OpenAICompatibleBackend,
  OPENAI_COMPATIBLE_PRESETS,
  type OpenAICompatibleBackendOptions,
  type OpenAICompatibleProvider,
} from "./openai-compatible.js";
export { EchoBackend } from "./echo.js";
export { registerConfiguredModels } from "./register.js";
