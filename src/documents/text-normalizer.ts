export function normalizeExtractedText(text: string): string {
  if (!text) {
    return "";
  }
  const collapsed = text
    .replace(/\u0000/g, "")
    .replace(/\r\n?/g, "\n")
    .replace(/ +/g, " ")
    .replace(/\n{3,}/g, "\n\n");
  return collapsed
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .trim();
}
