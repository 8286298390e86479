import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { EmailConfig } from "../types/config";
import type { EmailAttachment, EmailClient, Notifier, NotifyMeta } from "./notifier";

const MIME_TYPES: Record<string, string> = {
  ".md": "text/markdown",
  ".bib": "application/x-bibtex",
  ".pdf": "application/pdf"
};

export function buildEmailBody(meta: NotifyMeta, filenames: string[]): string {
  const headline = meta.recommendedCount === 0
    ? `No papers matched your research interests on ${meta.date}.`
    : `${meta.recommendedCount} recommended paper${meta.recommendedCount === 1 ? "" : "s"} for ${meta.date}.`;
  return [
    headline,
    "",
    "Attached:",
    ...filenames.map(f => `- ${f}`)
  ].join("\n");
}

export class EmailNotifier implements Notifier {
  constructor(private client: EmailClient, private config: EmailConfig) {}

  async send(attachmentPaths: string[], meta: NotifyMeta): Promise<void> {
    const attachments: EmailAttachment[] = [];
    for (const path of attachmentPaths) {
      const data = await readFile(path);
      attachments.push({
        filename: basename(path),
        content: data.toString("base64"),
        type: MIME_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream"
      });
    }

    await this.client.send({
      from: this.config.from,
      to: this.config.to,
      subject: `${this.config.subjectPrefix} ${meta.date}`,
      text: buildEmailBody(meta, attachments.map(a => a.filename)),
      attachments
    });
  }
}
