/**
 * Extract plain text from uploaded PDF, Word (.docx) and PowerPoint (.pptx) documents.
 */
import { parseOfficeAsync } from "officeparser";
import { createLogger } from "../lib/log.js";

const log = createLogger("extract");

/** Upload content types accepted by /upload. */
export const EXTRACTABLE_TYPES = new Set([
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation",
]);

export function isExtractable(contentType: string | undefined): boolean {
  if (!contentType) return false;
  return EXTRACTABLE_TYPES.has(contentType.split(";")[0].trim().toLowerCase());
}

/**
 * Returns plain text from the document buffer, or null if nothing could be extracted.
 */
export async function extractText(buffer: Buffer): Promise<string | null> {
  try {
    const text = await parseOfficeAsync(buffer);
    return (text && text.trim()) || null;
  } catch (err) {
    log.warn(`Text extraction failed: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
