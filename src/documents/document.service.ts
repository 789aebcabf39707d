import { Logger } from "../config/logger";
import { ExtractionError, errorMessage } from "../shared/errors";
import { DocumentType, OcrTextSource, TextExtractor } from "../shared/types/document.types";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";
import { normalizeExtractedText } from "./text-normalizer";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export interface DocumentExtractors {
  pdf: TextExtractor;
  docx: TextExtractor;
}

const DEFAULT_EXTRACTORS: DocumentExtractors = {
  pdf: extractPdfText,
  docx: extractDocxText,
};

export class DocumentService {
  constructor(
    private readonly logger: Logger,
    private readonly ocr?: OcrTextSource,
    private readonly extractors: DocumentExtractors = DEFAULT_EXTRACTORS,
  ) {}

  detectDocumentType(fileName?: string, mimeType?: string): DocumentType {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }
    if (normalizedMime.includes(DOCX_MIME) || normalizedFileName.endsWith(".docx")) {
      return "docx";
    }
    return "unknown";
  }

  async extractText(buffer: Buffer, fileName?: string, mimeType?: string): Promise<string> {
    const type = this.detectDocumentType(fileName, mimeType);
    if (type === "unknown") {
      throw new ExtractionError("unsupported_document", "Unsupported document type. Please upload PDF or DOCX.");
    }

    let text: string;
    try {
      text = normalizeExtractedText(await this.extractors[type](buffer));
    } catch (error) {
      this.logger.warn("Document parsing failed", { fileName, type, error: errorMessage(error) });
      throw new ExtractionError(
        "malformed_document",
        `Failed to parse ${type.toUpperCase()}: ${errorMessage(error)}. The file may be corrupted.`,
      );
    }

    let usedOcr = false;
    if (!text && type === "pdf" && this.ocr) {
      text = await this.recognizeWithOcr(buffer, fileName);
      usedOcr = true;
    }

    this.logger.info("Document text extracted", {
      mimeType,
      fileName,
      type,
      usedOcr,
      chars: text.length,
    });

    if (!text) {
      throw new ExtractionError(
        "empty_text",
        "Could not extract text from the document. It may be empty or text recognition failed.",
      );
    }
    return text;
  }

  private async recognizeWithOcr(buffer: Buffer, fileName?: string): Promise<string> {
    if (!this.ocr) {
      return "";
    }
    try {
      return normalizeExtractedText(await this.ocr.recognize(buffer, fileName));
    } catch (error) {
      this.logger.warn("OCR fallback failed", { fileName, error: errorMessage(error) });
      return "";
    }
  }
}
