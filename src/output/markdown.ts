import type { RecommendationMap } from "../types/paper";
import { countRecommendations } from "../recommend/recommender";

export interface DigestMarkdownOptions {
  date: string;
  query: string;
  interests: readonly string[];
  includeAbstract: boolean;
}

function escapeInline(s: string): string {
  return s.replace(/\r?\n/g, " ").replace(/([[\]])/g, "\\$1").trim();
}

export function buildDigestMarkdown(recommendations: RecommendationMap, opts: DigestMarkdownOptions): string {
  const frontmatter = [
    "---",
    "type: arxiv-digest",
    `date: ${opts.date}`,
    `query: "${opts.query.replace(/"/g, '\\"')}"`,
    `interests: [${opts.interests.map(i => `"${i.replace(/"/g, '\\"')}"`).join(", ")}]`,
    `recommended: ${countRecommendations(recommendations)}`,
    "---"
  ].join("\n");

  const sections = [frontmatter, "", `# arXiv Daily Digest: ${opts.date}`];

  if (recommendations.size === 0) {
    sections.push("", "_No recommended papers today._");
    return sections.join("\n") + "\n";
  }

  for (const [category, entries] of recommendations) {
    sections.push("", `## ${category} (${entries.length})`);
    entries.forEach(({ paper, reason }, i) => {
      sections.push("", `### ${i + 1}. [${escapeInline(paper.title)}](${paper.link})`, "");
      sections.push(`- **Authors**: ${paper.authors.join(", ") || "Unknown"}`);
      sections.push(`- **Published**: ${paper.published}`);
      sections.push(`- **arXiv**: ${paper.id}${paper.pdfLink ? ` ([PDF](${paper.pdfLink}))` : ""}`);
      if (paper.journalRef) sections.push(`- **Journal**: ${paper.journalRef}`);
      if (reason) sections.push(`- **Why**: ${escapeInline(reason)}`);
      if (opts.includeAbstract && paper.abstract) {
        sections.push("", `> ${paper.abstract}`);
      }
    });
  }

  return sections.join("\n") + "\n";
}
