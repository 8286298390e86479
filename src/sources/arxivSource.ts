import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { PaperRecord, SearchParams } from "../types/paper";
import type { DigestSettings } from "../types/config";
import type { PaperSource } from "./source";
import { toTimezoneTime } from "../utils/time";
import { logger } from "../logger";

export class ArxivHttpError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`arXiv API returned HTTP ${status} for ${url}`);
    this.name = "ArxivHttpError";
  }
}

interface AtomLink {
  "@_href"?: string;
  "@_rel"?: string;
  "@_type"?: string;
  "@_title"?: string;
}

interface AtomEntry {
  id?: unknown;
  title?: unknown;
  summary?: unknown;
  published?: unknown;
  updated?: unknown;
  journal_ref?: unknown;
  author?: Array<{ name?: unknown }>;
  link?: AtomLink[];
  category?: Array<{ "@_term"?: string }>;
  primary_category?: { "@_term"?: string };
}

interface AtomFeed {
  feed?: { entry?: AtomEntry[] };
}

export interface ArxivSourceOptions {
  timezone: string;
  apiUrl?: string;
  /** Waits before each retry of a 429 response */
  retryDelaysMs?: number[];
}

/** Text content of a parsed node, whether it came back bare or with attributes. */
function textOf(node: unknown): string {
  if (typeof node === "string") return node.trim();
  if (typeof node === "number") return String(node);
  if (typeof node === "object" && node !== null && "#text" in node) {
    return String(node["#text"]).trim();
  }
  return "";
}

/** `(cat:a OR cat:b) AND (all:"k1" OR all:"k2")`, either side optional */
export function buildQuery(categories: string[], keywords: string[]): string {
  const catParts = categories.map(c => `cat:${c}`);
  const catClause = catParts.length > 0 ? `(${catParts.join(" OR ")})` : "";

  if (keywords.length === 0) {
    return catClause || "all:*";
  }

  const kwParts = keywords.map(k => `all:"${k}"`);
  const kwClause = `(${kwParts.join(" OR ")})`;

  return catClause ? `${catClause} AND ${kwClause}` : kwClause;
}

/** The configured raw query, or one built from categories and keywords. */
export function resolveQuery(settings: Pick<DigestSettings, "query" | "categories" | "keywords">): string {
  return settings.query.trim() || buildQuery(settings.categories, settings.keywords);
}

const ARRAY_TAGS = new Set(["entry", "author", "link", "category"]);

export class ArxivSource implements PaperSource {
  name = "arxiv";

  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    removeNSPrefix: true,
    parseTagValue: false,
    isArray: (tagName) => ARRAY_TAGS.has(tagName)
  });
  private readonly apiUrl: string;
  private readonly retryDelaysMs: number[];

  constructor(private readonly options: ArxivSourceOptions) {
    this.apiUrl = options.apiUrl ?? "https://export.arxiv.org/api/query";
    this.retryDelaysMs = options.retryDelaysMs ?? [5000, 15000, 30000];
  }

  buildUrl(params: SearchParams): string {
    const encoded = encodeURIComponent(params.query);
    return `${this.apiUrl}?search_query=${encoded}&start=0&max_results=${params.maxResults}&sortBy=${params.sortBy}&sortOrder=${params.sortOrder}`;
  }

  parseEntry(entry: AtomEntry): PaperRecord | null {
    const rawId = textOf(entry.id);
    if (!rawId) return null;

    // http://arxiv.org/abs/2401.01234v1 → 2401.01234v1, old style hep-th/9901001v1 kept whole
    const idMatch = rawId.match(/arxiv\.org\/abs\/(.+)$/i);
    const id = idMatch ? idMatch[1] : rawId.split("/").pop() ?? rawId;

    const authors: string[] = [];
    for (const a of entry.author ?? []) {
      const name = textOf(a.name);
      if (name) authors.push(name);
    }

    let htmlLink = "";
    let pdfLink = "";
    for (const l of entry.link ?? []) {
      const href = l["@_href"] ?? "";
      if (l["@_rel"] === "alternate" || l["@_type"] === "text/html") htmlLink = href;
      if (l["@_title"] === "pdf" || l["@_type"] === "application/pdf") pdfLink = href;
    }

    const categories = (entry.category ?? [])
      .map(c => c["@_term"] ?? "")
      .filter(Boolean);

    const published = textOf(entry.published) || textOf(entry.updated);
    const journalRef = textOf(entry.journal_ref).replace(/\s+/g, " ");

    return {
      id,
      title: textOf(entry.title).replace(/\s+/g, " "),
      authors,
      published: published ? toTimezoneTime(published, this.options.timezone) : "",
      link: htmlLink || rawId,
      abstract: textOf(entry.summary).replace(/\s+/g, " "),
      journalRef: journalRef || undefined,
      pdfLink: pdfLink || undefined,
      categories,
      primaryCategory: entry.primary_category?.["@_term"]
    };
  }

  parseFeed(xmlText: string): PaperRecord[] {
    const valid = XMLValidator.validate(xmlText);
    if (valid !== true) {
      throw new Error(`arXiv XML parse error: ${valid.err.msg} (line ${valid.err.line})`);
    }

    const doc: AtomFeed = this.parser.parse(xmlText);
    const entries = doc.feed?.entry ?? [];

    // The API reports bad queries as a single entry whose id points at /api/errors
    if (entries.length === 1 && textOf(entries[0].id).includes("/api/errors")) {
      throw new Error(`arXiv API error: ${textOf(entries[0].summary)}`);
    }

    const papers: PaperRecord[] = [];
    for (const entry of entries) {
      const paper = this.parseEntry(entry);
      if (paper) papers.push(paper);
    }
    return papers;
  }

  async search(params: SearchParams): Promise<PaperRecord[]> {
    const url = this.buildUrl(params);

    // arXiv rate-limits with 429; back off and retry a few times
    const delays = this.retryDelaysMs;
    let lastErr: unknown;
    for (let attempt = 0; attempt <= delays.length; attempt++) {
      if (attempt > 0) {
        const wait = delays[attempt - 1];
        logger.warn(`arXiv 429, retrying in ${wait / 1000}s (attempt ${attempt}/${delays.length})...`);
        await new Promise(r => setTimeout(r, wait));
      }
      const response = await fetch(url, { method: "GET", signal: params.signal });
      if (response.status === 429 && attempt < delays.length) {
        await response.body?.cancel();
        lastErr = new ArxivHttpError(429, url);
        continue;
      }
      if (!response.ok) {
        await response.body?.cancel();
        throw new ArxivHttpError(response.status, url);
      }
      return this.parseFeed(await response.text());
    }
    throw lastErr;
  }
}
