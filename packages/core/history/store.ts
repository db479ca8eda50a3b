import type { HistoryEntry } from "../models/HistoryEntry";
import { makePreview } from "./preview";

export const HISTORY_CAPACITY = 50;
export const DEFAULT_VISIBLE_LIMIT = 20;

export interface ClipboardHistoryOptions {
  capacity?: number;
  visibleLimit?: number;
  /** Epoch milliseconds */
  now?: () => number;
}

/**
 * Bounded, newest-first clipboard history holding at most one entry per
 * distinct content. Every method is synchronous, so callers on the event loop
 * never observe a half-applied insert.
 */
export class ClipboardHistory {
  private entries: HistoryEntry[] = [];
  private readonly capacity: number;
  private visibleLimit: number;
  private readonly now: () => number;

  constructor(options: ClipboardHistoryOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? HISTORY_CAPACITY);
    this.visibleLimit = options.visibleLimit ?? DEFAULT_VISIBLE_LIMIT;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.length;
  }

  setVisibleLimit(limit: number): void {
    this.visibleLimit = Math.max(0, Math.floor(limit));
  }

  /**
   * Returns true when the entry was stored (or moved to the front).
   */
  add(content: string, mimeType: string, isBinary: boolean): boolean {
    if (!content) return false;
    if (this.entries.length > 0 && this.entries[0].content === content) return false;

    const existing = this.entries.findIndex((e) => e.content === content);
    if (existing !== -1) this.entries.splice(existing, 1);

    this.entries.unshift({
      content,
      mimeType,
      isBinary,
      timestamp: Math.floor(this.now() / 1000),
      preview: makePreview(content, mimeType, isBinary),
    });
    if (this.entries.length > this.capacity) {
      this.entries.length = this.capacity;
    }
    return true;
  }

  list(limit: number = this.visibleLimit): HistoryEntry[] {
    const n = Math.max(0, Math.floor(limit));
    return this.entries.slice(0, n).map((e) => ({ ...e }));
  }

  clear(): void {
    this.entries = [];
  }
}
