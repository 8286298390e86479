export type LLMProviderName = "openai_compatible" | "anthropic";

export interface LLMConfig {
  provider: LLMProviderName;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface EmailConfig {
  from: string;
  to: string[];
  subjectPrefix: string;
}

export interface PromptOverrides {
  system?: string;
  /** Must contain {{user_interests}} and {{paper_info}} */
  user?: string;
}

export interface DigestSettings {
  // arXiv search
  /** Raw arXiv search_query; when empty it is built from categories + keywords */
  query: string;
  categories: string[];
  keywords: string[];
  maxResults: number;
  sortBy: "submittedDate" | "lastUpdatedDate";
  /** Drop papers published more than N hours ago; 0 keeps everything the search returns */
  timeWindowHours: number;
  /** IANA zone used for publication timestamps and the digest date */
  timezone: string;

  researchInterests: string[];
  /** Skip papers emailed in previous runs; set false to always re-process all fetched papers */
  dedup: boolean;

  llm: LLMConfig;
  email: EmailConfig;

  // Output
  outputFolder: string;
  dataFolder: string;
  logFolder: string;
  exportBibtex: boolean;
  includeAbstract: boolean;

  prompts: PromptOverrides;
}
