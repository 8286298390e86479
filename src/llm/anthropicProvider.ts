import Anthropic from "@anthropic-ai/sdk";
import type { LLMProvider, LLMInput, LLMOutput } from "./provider";

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;

  constructor(apiKey: string, readonly model: string) {
    this.client = new Anthropic({ apiKey });
  }

  async generate(input: LLMInput): Promise<LLMOutput> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: input.maxTokens ?? 4096,
        temperature: input.temperature ?? 0.3,
        ...(input.system ? { system: input.system } : {}),
        messages: [{ role: "user", content: input.prompt }]
      },
      { signal: input.signal }
    );

    const text = response.content
      .map(b => (b.type === "text" ? b.text : ""))
      .join("");
    const usage = {
      inputTokens: response.usage?.input_tokens ?? 0,
      outputTokens: response.usage?.output_tokens ?? 0
    };

    return { text, usage, raw: response };
  }
}
