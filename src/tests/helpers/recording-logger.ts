import { Logger, LogLevel } from "../../config/logger";

export interface RecordedEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): Logger & { entries: RecordedEntry[] } {
  const entries: RecordedEntry[] = [];
  const record = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    entries.push({ level, message, meta });
  };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}
