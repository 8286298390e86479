import type { PaperRecord } from "../types/paper";

export const RECOMMENDER_SYSTEM_PROMPT = `You are an expert in academic paper recommendation. Given the titles and abstracts of papers and the user's research interests, decide whether each paper is high-quality and interesting enough to recommend to researchers in the field. A paper is worth recommending if it is closely related to the user's research interests and presents novel ideas or solid advances.
`;

export const RECOMMENDER_USER_PROMPT = `Here are the papers and my research interests:
My research interests: {{user_interests}}
{{paper_info}}
Which papers are worth recommending, which of my research interests does each belong to, and why do you recommend it?
You must output ONLY a valid JSON array as the entire response.
No markdown, no backticks, no extra text, no surrounding object.

Schema of each array element:
[
  {
  "paper_id": "<string>",
  "category": "<string>",
  "reason": "<string>"
  }
]
If no papers match, output [].
Copy each paper_id exactly as given above, in quotes.
`;

/** Replaces {{key}} placeholders in one pass; inserted values are never rescanned. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match
  );
}

export function buildPaperInfo(papers: readonly PaperRecord[]): string {
  return papers
    .map(p => `\nPaper ID: ${p.id}\nTitle: ${p.title}\nAbstract: ${p.abstract}\n`)
    .join("");
}

export function buildUserPrompt(
  papers: readonly PaperRecord[],
  interests: readonly string[],
  template: string = RECOMMENDER_USER_PROMPT
): string {
  return fillTemplate(template, {
    user_interests: interests.join(", "),
    paper_info: buildPaperInfo(papers)
  });
}
