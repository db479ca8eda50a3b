import type { ClipboardHistory } from "../history/store";
import { describeFailure, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { ClipboardSnapshot } from "../models/Snapshot";
import type { ClipboardAdapter } from "./adapter";

const log = createLogger("monitor");

export const DEFAULT_MONITOR_INTERVAL_S = 2;
export const MIN_MONITOR_INTERVAL_S = 0.5;

export type MonitorState = "idle" | "polling" | "stopped";
export type TickOutcome = "unchanged" | "changed" | "failed";

export interface SnapshotSink {
  clientCount(): number;
  broadcast(snapshot: ClipboardSnapshot): Promise<void>;
}

export interface MonitorSettings {
  enableHistory: boolean;
  /** Seconds between ticks */
  intervalSeconds: number;
}

export interface ClipboardMonitorOptions {
  adapter: Pick<ClipboardAdapter, "tryRead">;
  sink: SnapshotSink;
  history: ClipboardHistory;
  getSettings: () => MonitorSettings;
}

export interface ClipboardMonitor {
  start(): void;
  /** Resolves once the in-flight tick (if any) has finished. */
  stop(): Promise<void>;
  tick(): Promise<TickOutcome>;
  state(): MonitorState;
  lastSeen(): string | undefined;
}

export function intervalMs(seconds: number): number {
  const s = Number.isFinite(seconds) ? seconds : DEFAULT_MONITOR_INTERVAL_S;
  return Math.max(MIN_MONITOR_INTERVAL_S, s) * 1000;
}

/**
 * Polls the clipboard on a fixed interval and fans out changes.
 *
 * Ticks never overlap: the next one is scheduled only after the previous
 * finished. `lastSeen` is owned here and only touched synchronously after a
 * read completes.
 */
export function createClipboardMonitor(options: ClipboardMonitorOptions): ClipboardMonitor {
  const { adapter, sink, history, getSettings } = options;

  let current: MonitorState = "idle";
  let running = false;
  let stopped = false;
  let timer: ReturnType<typeof setTimeout> | undefined;
  let inFlight: Promise<TickOutcome> | undefined;
  let last: string | undefined;
  // bumped on every start so a loop left over from a previous run dies out
  let generation = 0;

  async function applyChange(snapshot: ClipboardSnapshot): Promise<void> {
    last = snapshot.content;
    log.debug("Clipboard changed", { type: snapshot.mimeType, bytes: snapshot.content.length });

    // `last` is already advanced; a failure in one step must not skip the other
    if (getSettings().enableHistory && snapshot.content) {
      try {
        history.add(snapshot.content, snapshot.mimeType, snapshot.isBinary);
      } catch (err) {
        log.error("Failed to record history:", errorMessage(err));
      }
    }
    if (sink.clientCount() > 0) {
      try {
        await sink.broadcast(snapshot);
      } catch (err) {
        log.error("Broadcast failed:", errorMessage(err));
      }
    }
  }

  async function check(): Promise<TickOutcome> {
    current = "polling";
    try {
      const outcome = await adapter.tryRead();
      if (!outcome.ok) {
        log.debug("Monitor read failed:", describeFailure(outcome.error));
        return "failed";
      }
      if (outcome.value.content === last) return "unchanged";
      await applyChange(outcome.value);
      return "changed";
    } catch (err) {
      log.debug("Monitor error:", errorMessage(err));
      return "failed";
    } finally {
      if (current === "polling") current = stopped ? "stopped" : "idle";
    }
  }

  function tick(): Promise<TickOutcome> {
    const p = check();
    inFlight = p;
    return p.finally(() => {
      if (inFlight === p) inFlight = undefined;
    });
  }

  function loop(gen: number): void {
    if (!running || gen !== generation) return;
    timer = setTimeout(() => {
      timer = undefined;
      void tick().then(() => loop(gen));
    }, intervalMs(getSettings().intervalSeconds));
  }

  return {
    start() {
      if (running) return;
      running = true;
      stopped = false;
      current = "idle";
      log.info("Clipboard monitor started");
      const gen = ++generation;
      void tick().then(() => loop(gen));
    },
    async stop() {
      if (!running) return;
      running = false;
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      if (inFlight) await inFlight;
      current = "stopped";
      log.info("Clipboard monitor stopped");
    },
    tick,
    state: () => current,
    lastSeen: () => last,
  };
}
