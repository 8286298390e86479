import { readFile } from "node:fs/promises";
import type { DigestSettings, EmailConfig, LLMConfig, PromptOverrides } from "./types/config";

export const DEFAULT_SETTINGS: DigestSettings = {
  query: "",
  categories: ["cs.AI", "cs.LG", "cs.CL"],
  keywords: [],
  maxResults: 50,
  sortBy: "submittedDate",
  timeWindowHours: 0,
  timezone: "UTC",

  researchInterests: [],
  dedup: true,

  llm: {
    provider: "openai_compatible",
    baseUrl: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
    temperature: 0.3,
    maxTokens: 4096
  },

  email: {
    from: "",
    to: [],
    subjectPrefix: "arXiv Daily Digest"
  },

  outputFolder: "digests",
  dataFolder: "data",
  logFolder: "logs",
  exportBibtex: true,
  includeAbstract: true,

  prompts: {}
};

export class ConfigError extends Error {
  constructor(message: string, readonly problems: string[] = []) {
    super(`[config] ${message}`);
    this.name = "ConfigError";
  }
}

/** What a config file may contain: any subset of the settings, nested objects included. */
export type SettingsOverrides = Partial<Omit<DigestSettings, "llm" | "email" | "prompts">> & {
  llm?: Partial<LLMConfig>;
  email?: Partial<EmailConfig>;
  prompts?: PromptOverrides;
};

/** Shallow merge over the defaults, with the nested objects merged one level down. */
export function mergeSettings(overrides: SettingsOverrides): DigestSettings {
  const settings: DigestSettings = Object.assign({}, DEFAULT_SETTINGS, overrides);
  settings.llm = Object.assign({}, DEFAULT_SETTINGS.llm, overrides.llm);
  settings.email = Object.assign({}, DEFAULT_SETTINGS.email, overrides.email);
  settings.prompts = Object.assign({}, DEFAULT_SETTINGS.prompts, overrides.prompts);
  return settings;
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every(s => typeof s === "string");
}

function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

/** Returns the list of problems; empty when the settings are usable. */
export function validateSettings(s: DigestSettings): string[] {
  const problems: string[] = [];

  if (typeof s.query !== "string") problems.push("query must be a string");
  if (!isStringArray(s.categories)) problems.push("categories must be an array of strings");
  if (!isStringArray(s.keywords)) problems.push("keywords must be an array of strings");
  if (
    typeof s.query === "string" && !s.query.trim() &&
    isStringArray(s.categories) && s.categories.length === 0 &&
    isStringArray(s.keywords) && s.keywords.length === 0
  ) {
    problems.push("set a query, or at least one category or keyword");
  }
  if (!Number.isInteger(s.maxResults) || s.maxResults <= 0) {
    problems.push("maxResults must be a positive integer");
  }
  if (s.sortBy !== "submittedDate" && s.sortBy !== "lastUpdatedDate") {
    problems.push(`sortBy must be "submittedDate" or "lastUpdatedDate"`);
  }
  if (typeof s.timeWindowHours !== "number" || !(s.timeWindowHours >= 0)) {
    problems.push("timeWindowHours must be a number >= 0");
  }
  if (typeof s.timezone !== "string" || !isValidTimezone(s.timezone)) {
    problems.push(`timezone "${String(s.timezone)}" is not a known IANA zone`);
  }
  if (!isStringArray(s.researchInterests) || s.researchInterests.length === 0) {
    problems.push("researchInterests must be a non-empty array of strings");
  }
  if (typeof s.dedup !== "boolean") problems.push("dedup must be true or false");

  if (s.llm.provider !== "openai_compatible" && s.llm.provider !== "anthropic") {
    problems.push(`llm.provider must be "openai_compatible" or "anthropic"`);
  }
  if (!isNonEmptyString(s.llm.baseUrl)) problems.push("llm.baseUrl must be a non-empty string");
  if (typeof s.llm.model !== "string" || !s.llm.model) problems.push("llm.model is required");
  if (typeof s.llm.temperature !== "number" || !(s.llm.temperature >= 0)) {
    problems.push("llm.temperature must be a number >= 0");
  }
  if (!Number.isInteger(s.llm.maxTokens) || s.llm.maxTokens <= 0) {
    problems.push("llm.maxTokens must be a positive integer");
  }

  if (typeof s.email.from !== "string" || !s.email.from) problems.push("email.from is required");
  if (!isStringArray(s.email.to) || s.email.to.length === 0) {
    problems.push("email.to must list at least one recipient");
  }
  if (typeof s.email.subjectPrefix !== "string") problems.push("email.subjectPrefix must be a string");

  for (const key of ["outputFolder", "dataFolder", "logFolder"] as const) {
    if (!isNonEmptyString(s[key])) problems.push(`${key} must be a non-empty string`);
  }
  if (typeof s.exportBibtex !== "boolean") problems.push("exportBibtex must be true or false");
  if (typeof s.includeAbstract !== "boolean") problems.push("includeAbstract must be true or false");

  // A user template missing a placeholder would send the model no papers (or no interests)
  const { system, user } = s.prompts;
  if (system !== undefined && typeof system !== "string") problems.push("prompts.system must be a string");
  if (user !== undefined) {
    if (typeof user !== "string") {
      problems.push("prompts.user must be a string");
    } else {
      for (const placeholder of ["{{user_interests}}", "{{paper_info}}"]) {
        if (!user.includes(placeholder)) problems.push(`prompts.user must contain ${placeholder}`);
      }
    }
  }

  return problems;
}

export async function loadSettings(path: string): Promise<DigestSettings> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config file ${path}: ${String(err)}`);
  }

  let overrides: SettingsOverrides;
  try {
    overrides = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`config file ${path} is not valid JSON: ${String(err)}`);
  }
  if (typeof overrides !== "object" || overrides === null || Array.isArray(overrides)) {
    throw new ConfigError(`config file ${path} must contain a JSON object`);
  }

  const settings = mergeSettings(overrides);
  const problems = validateSettings(settings);
  if (problems.length > 0) {
    throw new ConfigError(`invalid settings in ${path}:\n  - ${problems.join("\n  - ")}`, problems);
  }
  return settings;
}
