import type { ProcessedIdMap } from "../types/paper";
import type { FileWriter } from "./fileWriter";

export interface ProcessedIds {
  load(): Promise<Set<string>>;
  append(ids: Iterable<string>, date?: string): Promise<number>;
}

/**
 * Identifiers of papers already emailed. Only ever grows: append() unions
 * new ids in and keeps the date each id was first recorded.
 */
export class ProcessedIdStore implements ProcessedIds {
  private map: ProcessedIdMap = {};
  readonly path: string;

  constructor(private writer: FileWriter, dataFolder: string) {
    this.path = `${dataFolder}/processed_ids.json`;
  }

  async load(): Promise<Set<string>> {
    const content = await this.writer.readText(this.path);
    this.map = {};
    if (content) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (err) {
        throw new Error(`Processed-ID file ${this.path} is not valid JSON: ${String(err)}`);
      }
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Processed-ID file ${this.path} must contain a JSON object`);
      }
      for (const [id, date] of Object.entries(parsed)) {
        this.map[id] = typeof date === "string" ? date : "";
      }
    }
    return new Set(Object.keys(this.map));
  }

  has(id: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.map, id);
  }

  /** Unions ids into the store; the file is only rewritten when something new was added. */
  async append(ids: Iterable<string>, date = new Date().toISOString().slice(0, 10)): Promise<number> {
    let added = 0;
    for (const id of ids) {
      if (!this.has(id)) {
        this.map[id] = date;
        added++;
      }
    }
    if (added > 0) {
      await this.writer.writeText(this.path, JSON.stringify(this.map, null, 2));
    }
    return added;
  }

  getMap(): ProcessedIdMap {
    return { ...this.map };
  }
}
