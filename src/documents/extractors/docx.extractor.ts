import mammoth from "mammoth";

// Word files carry no page geometry, so the whole body is reported as page one.
export async function extractDocxPages(buffer: Buffer): Promise<string[]> {
  const result = await mammoth.extractRawText({ buffer });
  const text = normalizeDocxText(result.value);
  return text ? [text] : [];
}

export function normalizeDocxText(raw: string): string {
  return raw
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
