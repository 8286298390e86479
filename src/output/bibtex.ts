import type { PaperRecord, RecommendationMap } from "../types/paper";

/** arXiv id → citation key: 2401.01234v1 → arxiv2401_01234 */
export function citationKey(paper: PaperRecord): string {
  const base = paper.id.replace(/v\d+$/i, "");
  return `arxiv${base.replace(/[^A-Za-z0-9]+/g, "_")}`;
}

function escapeField(s: string): string {
  return s.replace(/\s+/g, " ").replace(/[{}]/g, "").trim();
}

export function toBibtexEntry(paper: PaperRecord): string {
  const fields: Array<[string, string]> = [
    ["title", escapeField(paper.title)],
    ["author", paper.authors.map(escapeField).join(" and ") || "Unknown"],
    ["year", paper.published.slice(0, 4) || "n.d."],
    ["eprint", paper.id],
    ["archivePrefix", "arXiv"]
  ];
  if (paper.primaryCategory) fields.push(["primaryClass", paper.primaryCategory]);
  if (paper.journalRef) fields.push(["journal", escapeField(paper.journalRef)]);
  fields.push(["url", paper.link]);

  // @article needs a journal; preprints go in as @misc
  const type = paper.journalRef ? "article" : "misc";
  const body = fields.map(([k, v]) => `  ${k}={${v}},`).join("\n");
  return `@${type}{${citationKey(paper)},\n${body}\n}`;
}

/** One entry per distinct paper, in first-seen order across categories. */
export function buildBibtex(recommendations: RecommendationMap): string {
  const seen = new Set<string>();
  const entries: string[] = [];
  for (const list of recommendations.values()) {
    for (const { paper } of list) {
      if (seen.has(paper.id)) continue;
      seen.add(paper.id);
      entries.push(toBibtexEntry(paper));
    }
  }
  return entries.join("\n\n") + "\n";
}
