import OpenAI from "openai";
import type { GenerateOptions } from "@promptline/pipeline";

// ─── OpenAI-compatible backend ─────────────────────────────────────────────────
// Native call: generate(prompt). DeepSeek and ZhipuAI speak the same API, so
// one client class covers them through a base URL preset.
// Docs: https://platform.deepseek.com/api-docs/ , https://open.bigmodel.cn/dev/api

export const OPENAI_COMPATIBLE_PRESETS = {
  openai: { baseURL: undefined, envKey: "OPENAI_API_KEY", defaultModel: "gpt-4o-mini" },
  deepseek: {
    baseURL: "https://api.deepseek.com/v1",
    envKey: "DEEPSEEK_API_KEY",
    defaultModel: "deepseek-chat",
  },
  zhipu: {
    baseURL: "https://open.bigmodel.cn/api/paas/v4",
    envKey: "ZHIPU_API_KEY",
    defaultModel: "glm-4-flash",
  },
} as const;

export type OpenAICompatibleProvider = keyof typeof OPENAI_COMPATIBLE_PRESETS;

export interface OpenAICompatibleBackendOptions {
  provider?: OpenAICompatibleProvider;
  apiKey?: string;
  model?: string;
}

export class OpenAICompatibleBackend {
  readonly name: OpenAICompatibleProvider;
  readonly model: string;
  private client: OpenAI;

  constructor(options: OpenAICompatibleBackendOptions = {}) {
    this.name = options.provider ?? "openai";
    const preset = OPENAI_COMPATIBLE_PRESETS[this.name];
    this.client = new OpenAI({
      apiKey: options.apiKey ?? process.env[preset.envKey] ?? "",
      ...(preset.baseURL ? { baseURL: preset.baseURL } : {}),
    });
    // Strip provider prefix: "deepseek/deepseek-chat" → "deepseek-chat"
    this.model = options.model?.replace(`${this.name}/`, "") ?? preset.defaultModel;
  }

  async generate(
    prompt: string,
    options: GenerateOptions
  ): Promise<{ text: string; raw: OpenAI.ChatCompletion }> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      },
      { signal: options.signal }
    );

    const text = completion.choices[0]?.message.content ?? "";
    return { text, raw: completion };
  }
}
