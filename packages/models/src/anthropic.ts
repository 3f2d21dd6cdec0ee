import Anthropic from "@anthropic-ai/sdk";
import type { GenerateOptions } from "@promptline/pipeline";

// ─── Anthropic backend ─────────────────────────────────────────────────────────
// Native call: complete(prompt). Register with entry point "complete".

export interface AnthropicBackendOptions {
  apiKey?: string;
  model?: string;
}

export class AnthropicBackend {
  readonly name = "anthropic";
  readonly model: string;
  private client: Anthropic;

  constructor(options: AnthropicBackendOptions = {}) {
    this.client = new Anthropic({ apiKey: options.apiKey ?? process.env.ANTHROPIC_API_KEY });
    // Strip provider prefix: "anthropic/claude-3-5-haiku-latest" → "claude-3-5-haiku-latest"
    this.model = options.model?.replace("anthropic/", "") ?? "claude-3-5-haiku-latest";
  }

  async complete(
    prompt: string,
    options: GenerateOptions
  ): Promise<{ text: string; raw: Anthropic.Message }> {
    const message = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens ?? 1024,
        messages: [{ role: "user", content: prompt }],
        // Messages API accepts 0..1
        ...(options.temperature !== undefined
          ? { temperature: Math.min(options.temperature, 1) }
          : {}),
      },
      { signal: options.signal }
    );

    const text = message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    return { text, raw: message };
  }
}
