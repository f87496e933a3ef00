import type { LogData, Logger } from "../../src/logger.js";

export interface CapturedEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  data: LogData;
}

/** Logger that keeps entries in memory, with bound context merged in. */
export const createCapturingLogger = (
  entries: CapturedEntry[] = [],
  context: LogData = {},
): Logger & { entries: CapturedEntry[] } => {
  const push =
    (level: CapturedEntry["level"]) =>
    (message: string, data?: LogData): void => {
      entries.push({ level, message, data: { ...context, ...(data ?? {}) } });
    };
  return {
    level: "debug",
    format: "json",
    entries,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    withContext: (extra) => createCapturingLogger(entries, { ...context, ...extra }),
  };
};
