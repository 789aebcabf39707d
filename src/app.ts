import express, { Express, NextFunction, Request, Response } from "express";
import { HrAnalyzerService } from "./analysis/hr-analyzer.service";
import { HR_LEXICON } from "./analysis/lexicon/lexicon.store";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { DocumentService } from "./documents/document.service";
import { OcrClient } from "./documents/ocr.client";
import { buildHrController } from "./http/hr.controller";
import { errorMessage } from "./shared/errors";

export interface AppContext {
  app: Express;
  logger: Logger;
}

export function createApp(env: EnvConfig, logger: Logger = createLogger({ minLevel: env.logLevel })): AppContext {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  const ocrClient = env.ocrServiceUrl
    ? new OcrClient({
        baseUrl: env.ocrServiceUrl,
        apiKey: env.ocrServiceApiKey,
        timeoutMs: env.ocrTimeoutMs,
      })
    : undefined;
  logger.info("OCR fallback", { enabled: Boolean(ocrClient) });
  logger.info("HR lexicon loaded", { version: HR_LEXICON.version });

  const analyzer = new HrAnalyzerService(logger);
  const documentService = new DocumentService(logger, ocrClient);

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use(
    "/hr",
    buildHrController({
      analyzer,
      documentService,
      logger,
      maxAnswerChars: env.maxAnswerChars,
      maxUploadBytes: env.maxUploadBytes,
    }),
  );

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    const status = readStatus(error);
    if (status >= 500) {
      logger.error("Unhandled request error", { error: errorMessage(error) });
    }
    response.status(status).json({ ok: false, error: status >= 500 ? "Internal error" : errorMessage(error) });
  });

  return { app, logger };
}

// body-parser attaches an HTTP status to the errors it raises (bad JSON, oversized body).
function readStatus(error: unknown): number {
  if (error && typeof error === "object") {
    const status: unknown = Reflect.get(error, "status");
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}
