import type { PaperRecord, SearchParams } from "../types/paper";

export interface PaperSource {
  name: string;
  search(params: SearchParams): Promise<PaperRecord[]>;
}

export function filterByWindow(papers: PaperRecord[], windowStart: Date, windowEnd: Date): PaperRecord[] {
  return papers.filter(p => {
    if (!p.published) return false;
    const d = new Date(p.published);
    return d >= windowStart && d <= windowEnd;
  });
}
