import type { RecommendationMap } from "../types/paper";
import type { DigestSettings } from "../types/config";
import type { FileWriter } from "../storage/fileWriter";
import { buildDigestMarkdown } from "./markdown";
import { buildBibtex } from "./bibtex";

export interface DigestRenderer {
  /** Writes the digest document; resolves to its path. */
  renderDigest(recommendations: RecommendationMap, date: string): Promise<string>;
  /** Writes a companion artifact next to `primaryPath`; may reject. */
  renderSecondary(primaryPath: string, recommendations: RecommendationMap): Promise<string>;
}

export class MarkdownDigestRenderer implements DigestRenderer {
  constructor(
    private writer: FileWriter,
    private settings: Pick<DigestSettings, "outputFolder" | "includeAbstract" | "researchInterests">,
    private query: string
  ) {}

  async renderDigest(recommendations: RecommendationMap, date: string): Promise<string> {
    const markdown = buildDigestMarkdown(recommendations, {
      date,
      query: this.query,
      interests: this.settings.researchInterests,
      includeAbstract: this.settings.includeAbstract
    });
    return this.writer.writeText(`${this.settings.outputFolder}/${date}.md`, markdown);
  }

  async renderSecondary(primaryPath: string, recommendations: RecommendationMap): Promise<string> {
    if (recommendations.size === 0) {
      throw new Error("No recommended papers to export as BibTeX");
    }
    const bibPath = primaryPath.replace(/\.md$/i, "") + ".bib";
    return this.writer.writeText(bibPath, buildBibtex(recommendations));
  }
}
