import dotenv from "dotenv";
import { LogLevel } from "./logger";

dotenv.config();

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  maxAnswerChars: number;
  maxUploadBytes: number;
  ocrServiceUrl?: string;
  ocrServiceApiKey?: string;
  ocrTimeoutMs: number;
}

type EnvSource = Record<string, string | undefined>;

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const maxAnswerCharsRaw = source.MAX_ANSWER_CHARS ?? "20000";
  const maxUploadBytesRaw = source.MAX_UPLOAD_BYTES ?? String(10 * 1024 * 1024);
  const ocrTimeoutRaw = source.OCR_TIMEOUT_MS ?? "30000";

  const port = Number(portRaw);
  const maxAnswerChars = Number(maxAnswerCharsRaw);
  const maxUploadBytes = Number(maxUploadBytesRaw);
  const ocrTimeoutMs = Number(ocrTimeoutRaw);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(maxAnswerChars) || maxAnswerChars < 100) {
    throw new Error(`Invalid MAX_ANSWER_CHARS value: ${maxAnswerCharsRaw}`);
  }
  if (!Number.isInteger(maxUploadBytes) || maxUploadBytes < 1024) {
    throw new Error(`Invalid MAX_UPLOAD_BYTES value: ${maxUploadBytesRaw}`);
  }
  if (!Number.isInteger(ocrTimeoutMs) || ocrTimeoutMs < 1000) {
    throw new Error(`Invalid OCR_TIMEOUT_MS value: ${ocrTimeoutRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    maxAnswerChars,
    maxUploadBytes,
    ocrServiceUrl: getOptionalTrimmed(source, "OCR_SERVICE_URL"),
    ocrServiceApiKey: getOptionalTrimmed(source, "OCR_SERVICE_API_KEY"),
    ocrTimeoutMs,
  };
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}
