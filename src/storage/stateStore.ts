import type { RunStage, RunState } from "../types/paper";
import type { FileWriter } from "./fileWriter";
import { logger } from "../logger";

export class StateStore {
  private state: RunState;
  private readonly path: string;

  constructor(private writer: FileWriter, dataFolder: string) {
    this.path = `${dataFolder}/state.json`;
    this.state = {
      lastRun: "",
      lastError: null
    };
  }

  async load(): Promise<void> {
    const content = await this.writer.readText(this.path);
    if (!content) return;
    try {
      const loaded: Partial<RunState> = JSON.parse(content);
      this.state = {
        lastRun: typeof loaded.lastRun === "string" ? loaded.lastRun : "",
        lastError: loaded.lastError ?? null
      };
    } catch (err) {
      logger.warn(`Ignoring unreadable run state at ${this.path}`, err);
    }
  }

  async save(): Promise<void> {
    await this.writer.writeText(this.path, JSON.stringify(this.state, null, 2));
  }

  get(): RunState {
    return { ...this.state };
  }

  async setLastRun(iso: string): Promise<void> {
    this.state.lastRun = iso;
    this.state.lastError = null;
    await this.save();
  }

  async setLastError(stage: RunStage, message: string): Promise<void> {
    this.state.lastError = { time: new Date().toISOString(), stage, message };
    await this.save();
  }
}
