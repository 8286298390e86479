/**
 * Single source of truth for secrets. Nothing else reads process.env for
 * credentials; required values throw at call time.
 */
import type { LLMProviderName } from "./types/config";
import { ConfigError } from "./settings";

export function getLLMApiKey(provider: LLMProviderName): string {
  const v = provider === "anthropic"
    ? process.env.ANTHROPIC_API_KEY
    : process.env.OPENAI_API_KEY || process.env.LLM_API_KEY;
  if (!v) {
    const name = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY (or LLM_API_KEY)";
    throw new ConfigError(`${name} is not set`);
  }
  return v;
}

export function getSendGridApiKey(): string {
  const v = process.env.SENDGRID_API_KEY;
  if (!v) throw new ConfigError("SENDGRID_API_KEY is not set");
  return v;
}

/** Config file path: --config flag wins, then DIGEST_CONFIG, then the default. */
export function getConfigPath(flag: string | undefined): string {
  return flag || process.env.DIGEST_CONFIG || "digest.config.json";
}
