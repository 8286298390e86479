import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Reads and writes text files under a root directory. Relative paths resolve against the root. */
export class FileWriter {
  constructor(private readonly rootDir: string) {}

  resolvePath(filePath: string): string {
    return resolve(this.rootDir, filePath);
  }

  async ensureFolderForFile(filePath: string): Promise<void> {
    await mkdir(dirname(this.resolvePath(filePath)), { recursive: true });
  }

  /** Writes the file, creating parent folders; returns the absolute path. */
  async writeText(filePath: string, content: string): Promise<string> {
    const full = this.resolvePath(filePath);
    await this.ensureFolderForFile(full);
    await writeFile(full, content, "utf8");
    return full;
  }

  /** null when the file does not exist; other read errors propagate. */
  async readText(filePath: string): Promise<string | null> {
    try {
      return await readFile(this.resolvePath(filePath), "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  /**
   * Append content to a log file, then rotate if the file exceeds maxBytes.
   * When rotating, the oldest half is discarded so the file stays near maxBytes/2.
   * Uses character count as a byte approximation.
   */
  async appendLogWithRotation(filePath: string, content: string, maxBytes: number): Promise<void> {
    const current = (await this.readText(filePath)) ?? "";
    let next = current + content;

    if (next.length > maxBytes) {
      // Keep the last half, aligned to a newline boundary
      const keepFrom = next.length - Math.floor(maxBytes / 2);
      const newlineIdx = next.indexOf("\n", keepFrom);
      const tail = newlineIdx !== -1 ? next.slice(newlineIdx + 1) : next.slice(keepFrom);
      const keptKB = Math.round(tail.length / 1024);
      next = `[LOG ROTATED ${new Date().toISOString()}: older entries removed, kept last ~${keptKB}KB]\n` + tail;
    }

    await this.writeText(filePath, next);
  }
}
