import { isImageMime } from "../models/enums";

export const PREVIEW_LENGTH = 100;

/**
 * Images reuse their base64 payload as the preview (no thumbnailing);
 * text is flattened to one line and cut to PREVIEW_LENGTH code points.
 */
export function makePreview(content: string, mimeType: string, isBinary: boolean): string {
  if (isBinary && isImageMime(mimeType)) return content;
  const flat = content.replace(/\n/g, " ").replace(/\r/g, "");
  // count code points so a surrogate pair is never split
  return Array.from(flat).slice(0, PREVIEW_LENGTH).join("");
}
