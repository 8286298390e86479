import type { LLMProvider, LLMInput, LLMOutput } from "./provider";

export class LLMHttpError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`LLM request failed with HTTP ${status}: ${body.slice(0, 500)}`);
    this.name = "LLMHttpError";
  }
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

export class OpenAICompatibleProvider implements LLMProvider {
  constructor(
    private baseUrl: string,
    private apiKey: string,
    readonly model: string
  ) {}

  async generate(input: LLMInput): Promise<LLMOutput> {
    const messages: Array<{ role: string; content: string }> = [];

    if (input.system) {
      messages.push({ role: "system", content: input.system });
    }
    messages.push({ role: "user", content: input.prompt });

    const body = {
      model: this.model,
      messages,
      temperature: input.temperature ?? 0.3,
      max_tokens: input.maxTokens ?? 4096
    };

    const url = this.baseUrl.replace(/\/$/, "") + "/chat/completions";

    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "Authorization": `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body),
      signal: input.signal
    });

    const responseText = await response.text();
    if (!response.ok) {
      throw new LLMHttpError(response.status, responseText);
    }

    const json: ChatCompletionResponse = JSON.parse(responseText);
    const text = json.choices?.[0]?.message?.content ?? "";
    const usage = json.usage ? {
      inputTokens: json.usage.prompt_tokens ?? 0,
      outputTokens: json.usage.completion_tokens ?? 0
    } : undefined;

    return { text, usage, raw: json };
  }
}
