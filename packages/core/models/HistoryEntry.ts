/**
 * A past clipboard snapshot retained in memory.
 */
import type { ClipboardSnapshot } from "./Snapshot";

export interface HistoryEntry extends ClipboardSnapshot {
  /** Capture time (epoch seconds) */
  timestamp: number;
  /** Single-line text excerpt, or the full base64 payload for images */
  preview: string;
}
