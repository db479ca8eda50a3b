import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { binarySnapshot, type ClipboardSnapshot } from "../models/Snapshot";
import { MimeType } from "../models/enums";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("clipboard");

export const FILE_URI_PREFIX = "file://";

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([".png", ".jpg", ".jpeg", ".gif", ".bmp", ".webp"]);

export function mimeForExtension(ext: string): string {
  const bare = ext.replace(/^\./, "").toLowerCase();
  return bare === "jpg" || bare === "jpeg" ? MimeType.Jpeg : `image/${bare}`;
}

/**
 * Decode the first line of a `file://` URI list into a local path.
 */
export function fileUriToPath(uri: string): string | null {
  const first = uri.trim().split(/\r?\n/)[0]?.trim() ?? "";
  if (!first.startsWith(FILE_URI_PREFIX)) return null;
  try {
    return fileURLToPath(first);
  } catch (err) {
    log.debug("Strict file URI parse failed, decoding the path:", errorMessage(err));
  }
  // a remote host or an encoded slash is rejected above; keep the decoded path
  try {
    return decodeURIComponent(new URL(first).pathname);
  } catch (err) {
    log.debug("Unparseable file URI", first, errorMessage(err));
    return null;
  }
}

/**
 * File managers put `file://` references on the clipboard instead of image
 * bytes. When the reference names an existing image file, load it.
 */
export async function readImageFromUri(uri: string): Promise<ClipboardSnapshot | null> {
  const filePath = fileUriToPath(uri);
  if (!filePath) return null;

  const ext = path.extname(filePath).toLowerCase();
  if (!IMAGE_EXTENSIONS.has(ext)) return null;

  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      log.error("Image file not found:", filePath);
      return null;
    }
    const bytes = await fs.readFile(filePath);
    const mimeType = mimeForExtension(ext);
    log.info(`Read image from URI: ${bytes.length} bytes, ${mimeType}`);
    return binarySnapshot(bytes, mimeType);
  } catch (err) {
    log.error("Failed to read image from URI:", errorMessage(err));
    return null;
  }
}
