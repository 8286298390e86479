import { afterEach, describe, expect, it, vi } from "vitest";
import { getConfigPath, getLLMApiKey, getSendGridApiKey } from "../env";
import { ConfigError } from "../settings";

describe("env", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads the Anthropic key for the anthropic provider", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-anthropic-key");
    expect(getLLMApiKey("anthropic")).toBe("test-anthropic-key");
  });

  it("falls back to LLM_API_KEY for OpenAI-compatible endpoints", () => {
    vi.stubEnv("OPENAI_API_KEY", "");
    vi.stubEnv("LLM_API_KEY", "test-llm-key");
    expect(getLLMApiKey("openai_compatible")).toBe("test-llm-key");
  });

  it("throws a ConfigError naming the missing variable", () => {
    vi.stubEnv("SENDGRID_API_KEY", "");
    expect(() => getSendGridApiKey()).toThrow(ConfigError);
    expect(() => getSendGridApiKey()).toThrow("[config] SENDGRID_API_KEY is not set");
  });

  it("resolves the config path from flag, env, then default", () => {
    vi.stubEnv("DIGEST_CONFIG", "");
    expect(getConfigPath(undefined)).toBe("digest.config.json");
    vi.stubEnv("DIGEST_CONFIG", "/etc/digest.json");
    expect(getConfigPath(undefined)).toBe("/etc/digest.json");
    expect(getConfigPath("./mine.json")).toBe("./mine.json");
  });
});
