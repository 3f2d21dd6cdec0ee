import type { ModelsConfig } from "@promptline/core";
import type { AdapterRegistry } from "@promptline/pipeline";
import { AnthropicBackend } from "./anthropic.js";
import { EchoBackend } from "./echo.js";
import { OpenAICompatibleBackend, type OpenAICompatibleProvider } from "./openai-compatible.js";

// ─── Configured models ─────────────────────────────────────────────────────────
// Each backend keeps its native method name; the registry entry point says
// which one generates.

export function registerConfiguredModels(
  registry: AdapterRegistry,
  config: ModelsConfig,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const keys = config.apiKeys ?? {};

  registry.register("echo", new EchoBackend(), "query");

  const anthropicKey = keys.anthropic ?? env.ANTHROPIC_API_KEY;
  if (anthropicKey) {
    registry.register(
      "anthropic",
      new AnthropicBackend({ apiKey: anthropicKey, model: config.anthropic.model }),
      "complete"
    );
  }

  const compatible: Array<[OpenAICompatibleProvider, string | undefined, string]> = [
    ["openai", keys.openai ?? env.OPENAI_API_KEY, config.openai.model],
    ["deepseek", keys.deepseek ?? env.DEEPSEEK_API_KEY, config.deepseek.model],
    ["zhipu", keys.zhipu ?? env.ZHIPU_API_KEY, config.zhipu.model],
  ];
  for (const [provider, apiKey, model] of compatible) {
    if (!apiKey) continue;
    registry.register(
      provider,
      new OpenAICompatibleBackend({ provider, apiKey, model }),
      "generate"
    );
  }

  return registry.list();
}
