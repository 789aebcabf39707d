import express, { Request, Response, Router } from "express";
import { HrAnalyzerService } from "../analysis/hr-analyzer.service";
import { Logger, logContext } from "../config/logger";
import { DocumentService } from "../documents/document.service";
import { ExtractionError, errorMessage } from "../shared/errors";

interface HrControllerDeps {
  analyzer: HrAnalyzerService;
  documentService: DocumentService;
  logger: Logger;
  maxAnswerChars: number;
  maxUploadBytes: number;
}

type ParsedAnswer = { ok: true; answer: string; question?: string } | { ok: false; error: string };

export function parseAnalyzeBody(body: unknown, maxAnswerChars: number): ParsedAnswer {
  if (!body || typeof body !== "object") {
    return { ok: false, error: "Invalid body" };
  }
  const answer: unknown = Reflect.get(body, "answer");
  const question: unknown = Reflect.get(body, "question");
  if (typeof answer !== "string") {
    return { ok: false, error: "Field 'answer' must be a string" };
  }
  if (answer.length > maxAnswerChars) {
    return { ok: false, error: `Answer exceeds ${maxAnswerChars} characters` };
  }
  if (question !== undefined && question !== null && typeof question !== "string") {
    return { ok: false, error: "Field 'question' must be a string" };
  }
  return { ok: true, answer, question: typeof question === "string" ? question : undefined };
}

export function buildHrController(deps: HrControllerDeps): Router {
  const router = Router();

  router.get("/questions", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, questions: deps.analyzer.listQuestions() });
  });

  router.post("/analyze", (request: Request, response: Response) => {
    const parsed = parseAnalyzeBody(request.body, deps.maxAnswerChars);
    if (!parsed.ok) {
      response.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    const result = deps.analyzer.analyze({ answer: parsed.answer, question: parsed.question });
    response.status(200).json({ ok: true, result });
  });

  router.post(
    "/analyze-document",
    express.raw({ type: () => true, limit: deps.maxUploadBytes }),
    async (request: Request, response: Response) => {
      const startedAt = Date.now();
      const body: unknown = request.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        response.status(400).json({ ok: false, error: "Document body is empty" });
        return;
      }
      const fileName = typeof request.query.fileName === "string" ? request.query.fileName : undefined;
      const question = typeof request.query.question === "string" ? request.query.question : undefined;

      try {
        const answer = await deps.documentService.extractText(body, fileName, request.header("content-type"));
        if (answer.length > deps.maxAnswerChars) {
          response.status(400).json({ ok: false, error: `Answer exceeds ${deps.maxAnswerChars} characters` });
          return;
        }
        const result = deps.analyzer.analyze({ answer, question });
        response.status(200).json({ ok: true, result });
      } catch (error) {
        if (error instanceof ExtractionError) {
          logContext(deps.logger, "warn", "Document extraction rejected", {
            route: "/hr/analyze-document",
            status: 422,
            latency_ms: Date.now() - startedAt,
            ok: false,
            error_code: error.code,
          });
          response.status(422).json({ ok: false, error: error.message, code: error.code });
          return;
        }
        logContext(
          deps.logger,
          "error",
          "Failed to analyze document",
          {
            route: "/hr/analyze-document",
            status: 500,
            latency_ms: Date.now() - startedAt,
            ok: false,
          },
          { error: errorMessage(error) },
        );
        response.status(500).json({ ok: false, error: "Internal error" });
      }
    },
  );

  return router;
}
