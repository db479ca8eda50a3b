import { z } from "zod";
import type { ClipboardSnapshot } from "../models/Snapshot";
import type { HistoryEntry } from "../models/HistoryEntry";
import { MimeType } from "../models/enums";

/** Keep-alive tokens exchanged over the live channel. */
export const PING = "ping";
export const PONG = "pong";

export type ClipboardResponse =
  | { success: true; type: string; content: string; is_binary: boolean }
  | { success: false; type: string; content: ""; is_binary: false; error: string };

export type WriteResponse = { success: true } | { success: false; error: string };

export type HistoryEntryWire = {
  content: string;
  timestamp: number;
  preview: string;
  type: string;
  is_binary: boolean;
};

export type HistoryResponse = { success: true; history: HistoryEntryWire[] };

export type StatusResponse = {
  running: boolean;
  ip: string;
  clipboard_available: boolean;
};

export type ErrorResponse = { success: false; error: string };

export const writeRequestSchema = z.object({
  content: z.string(),
  type: z.string().min(1).default(MimeType.Text),
  is_base64: z.boolean().default(false),
});

export const restoreRequestSchema = z.object({
  content: z.string(),
  type: z.string().min(1).default(MimeType.Text),
  is_binary: z.boolean().default(false),
});

export function toClipboardResponse(snapshot: ClipboardSnapshot): ClipboardResponse {
  return {
    success: true,
    type: snapshot.mimeType,
    content: snapshot.content,
    is_binary: snapshot.isBinary,
  };
}

export function clipboardError(error: string): ClipboardResponse {
  return { success: false, type: MimeType.Text, content: "", is_binary: false, error };
}

export function toHistoryWire(entry: HistoryEntry): HistoryEntryWire {
  return {
    content: entry.content,
    timestamp: entry.timestamp,
    preview: entry.preview,
    type: entry.mimeType,
    is_binary: entry.isBinary,
  };
}

/**
 * One-line summary of a zod error for `{ success: false, error }` bodies.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
