export type DocumentType = "pdf" | "docx" | "unknown";

export type TextExtractor = (buffer: Buffer) => Promise<string>;

export interface OcrTextSource {
  recognize(buffer: Buffer, fileName?: string): Promise<string>;
}
