import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_SETTINGS, loadSettings, mergeSettings, validateSettings } from "../settings";

const minimal = {
  researchInterests: ["LLM", "agents"],
  email: { from: "digest@example.com", to: ["reader@example.com"] }
};

describe("mergeSettings", () => {
  it("merges nested objects over the defaults", () => {
    const s = mergeSettings({ ...minimal, llm: { provider: "anthropic", model: "claude-test" } });

    expect(s.llm).toEqual({
      provider: "anthropic",
      baseUrl: DEFAULT_SETTINGS.llm.baseUrl,
      model: "claude-test",
      temperature: 0.3,
      maxTokens: 4096
    });
    expect(s.email.subjectPrefix).toBe("arXiv Daily Digest");
    expect(s.email.to).toEqual(["reader@example.com"]);
    expect(s.categories).toEqual(["cs.AI", "cs.LG", "cs.CL"]);
  });

  it("does not mutate the defaults", () => {
    mergeSettings({ llm: { model: "other" }, email: { from: "x@example.com" } });
    expect(DEFAULT_SETTINGS.llm.model).toBe("gpt-4o-mini");
    expect(DEFAULT_SETTINGS.email.from).toBe("");
  });
});

describe("validateSettings", () => {
  it("accepts a minimal config", () => {
    expect(validateSettings(mergeSettings(minimal))).toEqual([]);
  });

  it("lists every problem", () => {
    const problems = validateSettings(mergeSettings({
      maxResults: 0,
      timezone: "Mars/Olympus_Mons",
      researchInterests: [],
      email: { from: "", to: [] }
    }));

    expect(problems).toEqual([
      "maxResults must be a positive integer",
      'timezone "Mars/Olympus_Mons" is not a known IANA zone',
      "researchInterests must be a non-empty array of strings",
      "email.from is required",
      "email.to must list at least one recipient"
    ]);
  });

  it("lists mistyped values from a config file", () => {
    const fromFile = mergeSettings(JSON.parse(JSON.stringify({
      ...minimal,
      dedup: "false",
      exportBibtex: "false",
      includeAbstract: 1,
      outputFolder: "",
      logFolder: null,
      llm: { baseUrl: "", temperature: "0.3", maxTokens: "4096" },
      email: { ...minimal.email, subjectPrefix: 7 }
    })));

    expect(validateSettings(fromFile)).toEqual([
      "dedup must be true or false",
      "llm.baseUrl must be a non-empty string",
      "llm.temperature must be a number >= 0",
      "llm.maxTokens must be a positive integer",
      "email.subjectPrefix must be a string",
      "outputFolder must be a non-empty string",
      "logFolder must be a non-empty string",
      "exportBibtex must be true or false",
      "includeAbstract must be true or false"
    ]);
  });

  it("requires both placeholders in a user prompt override", () => {
    expect(validateSettings(mergeSettings({ ...minimal, prompts: { user: "Interests: {{user_interests}}" } })))
      .toEqual(["prompts.user must contain {{paper_info}}"]);
    expect(validateSettings(mergeSettings({ ...minimal, prompts: { user: "{{paper_info}}" } })))
      .toEqual(["prompts.user must contain {{user_interests}}"]);
    expect(validateSettings(mergeSettings({
      ...minimal,
      prompts: { system: "Be strict.", user: "I like {{user_interests}}.{{paper_info}}" }
    }))).toEqual([]);
  });

  it("rejects non-string prompt overrides", () => {
    const fromFile = mergeSettings(JSON.parse(JSON.stringify({ ...minimal, prompts: { system: ["x"], user: 3 } })));
    expect(validateSettings(fromFile)).toEqual([
      "prompts.system must be a string",
      "prompts.user must be a string"
    ]);
  });

  it("needs something to search for", () => {
    const problems = validateSettings(mergeSettings({ ...minimal, query: "", categories: [], keywords: [] }));
    expect(problems).toEqual(["set a query, or at least one category or keyword"]);
  });
});

describe("loadSettings", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "arxiv-digest-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("loads and validates a config file", async () => {
    const path = join(root, "digest.config.json");
    await writeFile(path, JSON.stringify({ ...minimal, timezone: "Asia/Shanghai", maxResults: 20 }));

    const s = await loadSettings(path);

    expect(s.timezone).toBe("Asia/Shanghai");
    expect(s.maxResults).toBe(20);
    expect(s.researchInterests).toEqual(["LLM", "agents"]);
  });

  it("rejects a missing file", async () => {
    await expect(loadSettings(join(root, "absent.json"))).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects invalid JSON", async () => {
    const path = join(root, "bad.json");
    await writeFile(path, "{ nope");
    await expect(loadSettings(path)).rejects.toThrow(/is not valid JSON/);
  });

  it("rejects a non-object document", async () => {
    const path = join(root, "list.json");
    await writeFile(path, "[]");
    await expect(loadSettings(path)).rejects.toThrow(/must contain a JSON object/);
  });

  it("refuses a user prompt that would hide the papers from the model", async () => {
    const path = join(root, "prompt.json");
    await writeFile(path, JSON.stringify({ ...minimal, prompts: { user: "Interests: {{user_interests}}" } }));
    await expect(loadSettings(path)).rejects.toMatchObject({
      name: "ConfigError",
      problems: ["prompts.user must contain {{paper_info}}"]
    });
  });

  it("reports validation problems", async () => {
    const path = join(root, "invalid.json");
    await writeFile(path, JSON.stringify({ ...minimal, maxResults: -1 }));
    await expect(loadSettings(path)).rejects.toMatchObject({
      name: "ConfigError",
      problems: ["maxResults must be a positive integer"]
    });
  });
});
