import { afterEach, describe, expect, it, vi } from "vitest";
import { LLMHttpError, OpenAICompatibleProvider } from "../llm/openaiCompatible";
import { AnthropicProvider } from "../llm/anthropicProvider";
import { buildLLMProvider } from "../llm/factory";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create };
  }
}));

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("OpenAICompatibleProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a chat completion and returns the message text", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({
      choices: [{ message: { content: "[]" } }],
      usage: { prompt_tokens: 12, completion_tokens: 1 }
    }));
    vi.stubGlobal("fetch", fetchMock);
    const provider = new OpenAICompatibleProvider("https://llm.example.com/v1/", "test-key", "test-model");

    const out = await provider.generate({ system: "sys", prompt: "hi", maxTokens: 256 });

    expect(out.text).toBe("[]");
    expect(out.usage).toEqual({ inputTokens: 12, outputTokens: 1 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.example.com/v1/chat/completions");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({ "Content-Type": "application/json", "Authorization": "Bearer test-key" });
    expect(JSON.parse(String(init.body))).toEqual({
      model: "test-model",
      messages: [{ role: "system", content: "sys" }, { role: "user", content: "hi" }],
      temperature: 0.3,
      max_tokens: 256
    });
  });

  it("returns empty text when the reply has no choices", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })));
    const provider = new OpenAICompatibleProvider("https://llm.example.com/v1", "test-key", "test-model");

    const out = await provider.generate({ prompt: "hi" });

    expect(out.text).toBe("");
    expect(out.usage).toBeUndefined();
  });

  it("throws on non-2xx responses", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("bad key", { status: 401 })));
    const provider = new OpenAICompatibleProvider("https://llm.example.com/v1", "test-key", "test-model");

    const err = await provider.generate({ prompt: "hi" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LLMHttpError);
    expect(err).toMatchObject({ status: 401, body: "bad key" });
  });
});

describe("AnthropicProvider", () => {
  afterEach(() => {
    create.mockReset();
  });

  it("sends the system prompt separately and joins text blocks", async () => {
    create.mockResolvedValue({
      content: [{ type: "text", text: "[" }, { type: "text", text: "]" }],
      usage: { input_tokens: 10, output_tokens: 2 }
    });
    const provider = new AnthropicProvider("test-key", "claude-test");

    const out = await provider.generate({ system: "sys", prompt: "hi", maxTokens: 100 });

    expect(create).toHaveBeenCalledWith(
      {
        model: "claude-test",
        max_tokens: 100,
        temperature: 0.3,
        system: "sys",
        messages: [{ role: "user", content: "hi" }]
      },
      { signal: undefined }
    );
    expect(out.text).toBe("[]");
    expect(out.usage).toEqual({ inputTokens: 10, outputTokens: 2 });
  });

  it("omits an empty system prompt", async () => {
    create.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 0 } });

    const out = await new AnthropicProvider("test-key", "claude-test").generate({ prompt: "hi" });

    expect(create.mock.calls[0][0]).not.toHaveProperty("system");
    expect(out.text).toBe("");
  });
});

describe("buildLLMProvider", () => {
  const base = { baseUrl: "https://llm.example.com/v1", model: "m", temperature: 0.3, maxTokens: 100 };

  it("picks the provider class by name", () => {
    expect(buildLLMProvider({ ...base, provider: "openai_compatible" }, "test-key")).toBeInstanceOf(OpenAICompatibleProvider);
    expect(buildLLMProvider({ ...base, provider: "anthropic" }, "test-key")).toBeInstanceOf(AnthropicProvider);
  });

  it("exposes the model name", () => {
    expect(buildLLMProvider({ ...base, provider: "anthropic" }, "test-key").model).toBe("m");
  });
});
