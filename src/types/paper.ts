export interface PaperRecord {
  readonly id: string;            // e.g. "2401.01234v1"
  readonly title: string;
  readonly authors: readonly string[];
  readonly published: string;     // ISO-8601 in the configured timezone
  readonly link: string;          // https://arxiv.org/abs/<id>
  readonly abstract: string;
  readonly journalRef?: string;
  readonly pdfLink?: string;
  readonly categories: readonly string[];
  readonly primaryCategory?: string;
}

export interface SearchParams {
  query: string;
  maxResults: number;
  sortBy: "submittedDate" | "lastUpdatedDate";
  sortOrder: "descending" | "ascending";
  signal?: AbortSignal;
}

/** One element of the model's JSON reply, after validation. */
export interface RecommendationItem {
  paperId: string;
  category: string;
  reason: string;
}

export interface RecommendedPaper {
  paper: PaperRecord;
  reason: string;
}

/** Lower-cased category → papers in the order the model listed them. */
export type RecommendationMap = Map<string, RecommendedPaper[]>;

export type ProcessedIdMap = Record<string, string>; // paperId -> firstSeenDate (YYYY-MM-DD)

export type RunStage = "fetch" | "recommend" | "render" | "notify";

export interface RunState {
  lastRun: string;    // ISO or ""
  lastError: {
    time: string;
    stage: RunStage;
    message: string;
  } | null;
}
