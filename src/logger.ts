const PREFIX = "[ArxivDigest]";

export const logger = {
  info: (message: string, data?: unknown) => {
    if (data === undefined) console.info(`${PREFIX} ${message}`);
    else console.info(`${PREFIX} ${message}`, data);
  },
  warn: (message: string, data?: unknown) => {
    if (data === undefined) console.warn(`${PREFIX} ${message}`);
    else console.warn(`${PREFIX} ${message}`, data);
  },
  error: (message: string, error?: unknown) => {
    if (error === undefined) console.error(`${PREFIX} ${message}`);
    else console.error(`${PREFIX} ${message}`, error);
  },
  debug: (message: string, data?: unknown) => {
    if (process.env.DEBUG) {
      console.log(`${PREFIX} ${message}`, data ?? "");
    }
  },
};

export type LogLevel = "INFO" | "WARN" | "ERROR";

/**
 * Collects the lines of a single pipeline run so they can be appended to
 * runs.log at the end, and echoes each one to the console logger.
 */
export interface RunLog {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  readonly lines: readonly string[];
}

export function createRunLog(now: () => Date = () => new Date()): RunLog {
  const lines: string[] = [];
  const write = (level: LogLevel, message: string) => {
    lines.push(`[${now().toISOString()}] ${level} ${message}`);
    if (level === "ERROR") logger.error(message);
    else if (level === "WARN") logger.warn(message);
    else logger.info(message);
  };
  return {
    info: (message) => write("INFO", message),
    warn: (message) => write("WARN", message),
    error: (message) => write("ERROR", message),
    lines,
  };
}
