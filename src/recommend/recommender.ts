import type { PaperRecord, RecommendationItem, RecommendationMap } from "../types/paper";
import type { LLMProvider, LLMUsage } from "../llm/provider";
import { RecommendationError } from "./errors";
import { RECOMMENDER_SYSTEM_PROMPT, RECOMMENDER_USER_PROMPT, buildUserPrompt } from "./prompts";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function typeName(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  return typeof v;
}

/** Checks one array element of the reply; `raw` is only used for the error. */
function validateItem(item: unknown, idx: number, raw: string): RecommendationItem {
  if (!isRecord(item)) {
    throw new RecommendationError(
      "ItemNotObject",
      `LLM array items must be objects, item ${idx} is ${typeName(item)}`,
      raw,
      idx
    );
  }

  const paperId = item.paper_id;
  const category = item.category;
  const reason = "reason" in item ? item.reason : "";

  if (typeof paperId !== "string" || !paperId.trim()) {
    throw new RecommendationError("InvalidPaperId", `Missing/invalid paper_id at item ${idx}`, raw, idx);
  }
  if (typeof category !== "string" || !category.trim()) {
    throw new RecommendationError("InvalidCategory", `Missing/invalid category at item ${idx}`, raw, idx);
  }
  if (typeof reason !== "string") {
    throw new RecommendationError("InvalidReason", `Invalid reason at item ${idx} (must be string)`, raw, idx);
  }

  return { paperId, category, reason };
}

/**
 * Turns the model's raw reply into a category → papers map. All-or-nothing:
 * the first malformed item or unknown paper id fails the whole reply.
 * Categories are bucketed lower-cased; ids must match a fetched paper exactly.
 */
export function parseRecommendations(
  raw: string | null | undefined,
  papers: readonly PaperRecord[]
): RecommendationMap {
  if (!raw || !raw.trim()) {
    throw new RecommendationError("EmptyResponse", "LLM returned an empty response", raw ?? "");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new RecommendationError("MalformedJSON", `LLM did not return valid JSON (${String(err)})`, raw);
  }

  if (!Array.isArray(parsed)) {
    throw new RecommendationError(
      "NotAnArray",
      `LLM response must be a JSON array, got ${typeName(parsed)}`,
      raw
    );
  }

  const recommendations: RecommendationMap = new Map();
  parsed.forEach((element: unknown, idx) => {
    const item = validateItem(element, idx, raw);
    const bucketKey = item.category.toLowerCase();

    const paper = papers.find(p => p.id === item.paperId);
    if (!paper) {
      throw new RecommendationError(
        "UnknownPaperId",
        `LLM returned paper_id '${item.paperId}' not present in fetched papers`,
        raw,
        idx
      );
    }

    const bucket = recommendations.get(bucketKey);
    if (bucket) bucket.push({ paper, reason: item.reason });
    else recommendations.set(bucketKey, [{ paper, reason: item.reason }]);
  });

  return recommendations;
}

export function countRecommendations(recommendations: RecommendationMap): number {
  let n = 0;
  for (const entries of recommendations.values()) n += entries.length;
  return n;
}

export interface RecommendOptions {
  systemPrompt?: string;
  userPromptTemplate?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface RecommendResult {
  recommendations: RecommendationMap;
  raw: string;
  usage?: LLMUsage;
}

export async function recommendPapers(
  papers: readonly PaperRecord[],
  interests: readonly string[],
  llm: LLMProvider,
  options: RecommendOptions = {}
): Promise<RecommendResult> {
  if (papers.length === 0) {
    throw new RangeError("recommendPapers needs at least one paper");
  }

  const result = await llm.generate({
    system: options.systemPrompt ?? RECOMMENDER_SYSTEM_PROMPT,
    prompt: buildUserPrompt(papers, interests, options.userPromptTemplate ?? RECOMMENDER_USER_PROMPT),
    temperature: options.temperature,
    maxTokens: options.maxTokens,
    signal: options.signal
  });

  return {
    recommendations: parseRecommendations(result.text, papers),
    raw: result.text,
    usage: result.usage
  };
}
