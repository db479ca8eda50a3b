/**
 * The clipboard's current content plus its type metadata.
 */
import { MimeType } from "./enums";

export interface ClipboardSnapshot {
  /** Text, or base64 of the raw bytes when `isBinary` */
  content: string;
  /** e.g. "text/plain" or "image/png" */
  mimeType: string;
  isBinary: boolean;
}

export const EMPTY_SNAPSHOT: Readonly<ClipboardSnapshot> = Object.freeze({
  content: "",
  mimeType: MimeType.Text,
  isBinary: false,
});

export function emptySnapshot(): ClipboardSnapshot {
  return { ...EMPTY_SNAPSHOT };
}

export function textSnapshot(content: string): ClipboardSnapshot {
  return { content, mimeType: MimeType.Text, isBinary: false };
}

export function binarySnapshot(bytes: Uint8Array, mimeType: string): ClipboardSnapshot {
  return {
    content: Buffer.from(bytes).toString("base64"),
    mimeType,
    isBinary: true,
  };
}
