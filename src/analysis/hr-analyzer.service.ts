import { Logger } from "../config/logger";
import { AnalysisResult, AnalyzeInput, HrQuestion } from "../shared/types/hr-analysis.types";
import { analyzeHrResponse } from "./hr-analyzer";
import { HR_LEXICON, HrLexicon } from "./lexicon/lexicon.store";
import { getHrQuestionBank } from "./question-bank";

export class HrAnalyzerService {
  constructor(
    private readonly logger: Logger,
    private readonly lexicon: HrLexicon = HR_LEXICON,
  ) {}

  analyze(input: AnalyzeInput): AnalysisResult {
    const startedAt = Date.now();
    const result = analyzeHrResponse(input, this.lexicon);
    const meta = {
      lexiconVersion: this.lexicon.version,
      hasQuestion: Boolean(input.question),
      answerChars: input.answer.length,
      clarity: result.clarity,
      confidence: result.confidence,
      structure: result.structure,
      totalScore: result.totalScore,
      redFlags: result.details.redFlags.length,
      latencyMs: Date.now() - startedAt,
    };

    if (!result.isValid) {
      this.logger.warn("hr.analysis.rejected", { ...meta, reason: result.rejectionReason });
    } else {
      this.logger.info("hr.analysis.completed", meta);
    }
    return result;
  }

  listQuestions(): HrQuestion[] {
    return getHrQuestionBank();
  }
}
