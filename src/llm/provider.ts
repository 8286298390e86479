export interface LLMInput {
  system?: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMOutput {
  text: string;
  usage?: LLMUsage;
  raw?: unknown;
}

/** Prompt in, raw text out. Retries and rate limits are the caller's business. */
export interface LLMProvider {
  readonly model: string;
  generate(input: LLMInput): Promise<LLMOutput>;
}
