import FormData from "form-data";
import fetch from "node-fetch";

interface OcrResponse {
  text?: unknown;
}

export interface OcrClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

/** Posts a scanned document to an HTTP OCR service and returns the recognised text. */
export class OcrClient {
  constructor(private readonly options: OcrClientOptions) {}

  async recognize(buffer: Buffer, fileName = "document.pdf"): Promise<string> {
    const form = new FormData();
    form.append("file", buffer, {
      filename: fileName,
      contentType: "application/pdf",
    });

    const headers: Record<string, string> = { ...form.getHeaders() };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await withTimeout(
      fetch(this.options.baseUrl, {
        method: "POST",
        headers,
        body: form,
      }),
      this.options.timeoutMs,
    );

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`OCR service error: HTTP ${response.status} - ${body.slice(0, 200)}`);
    }

    const body = (await response.json()) as OcrResponse;
    return typeof body.text === "string" ? body.text : "";
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("OCR request timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}
