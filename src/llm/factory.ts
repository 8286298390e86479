import type { LLMConfig } from "../types/config";
import type { LLMProvider } from "./provider";
import { AnthropicProvider } from "./anthropicProvider";
import { OpenAICompatibleProvider } from "./openaiCompatible";

export function buildLLMProvider(config: LLMConfig, apiKey: string): LLMProvider {
  switch (config.provider) {
    case "anthropic":
      return new AnthropicProvider(apiKey, config.model);
    case "openai_compatible":
      return new OpenAICompatibleProvider(config.baseUrl, apiKey, config.model);
    default: {
      const exhaustive: never = config.provider;
      throw new Error(`Unknown LLM provider: ${String(exhaustive)}`);
    }
  }
}
