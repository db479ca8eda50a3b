import { describeFailure, errorMessage, type NetworkSendError } from "../errors";
import type { ClipboardHistory } from "../history/store";
import { createLogger } from "../logger";
import type { ClipboardSnapshot } from "../models/Snapshot";
import type { ClipboardAdapter } from "../clipboard/adapter";
import {
  PING,
  PONG,
  clipboardError,
  toClipboardResponse,
  type ClipboardResponse,
  type WriteResponse,
} from "./protocol";

const log = createLogger("hub");

/**
 * An open streaming connection to a remote observer.
 */
export interface LiveClient {
  readonly id: string;
  /** Rejects when the payload could not be handed to the connection. */
  send(payload: string): Promise<void>;
  close(code?: number, reason?: string): void;
}

export interface BroadcastHubOptions {
  adapter: ClipboardAdapter;
  history: ClipboardHistory;
  isHistoryEnabled: () => boolean;
}

export interface BroadcastHub {
  register(client: LiveClient): void;
  unregister(client: LiveClient): void;
  clientCount(): number;
  broadcast(snapshot: ClipboardSnapshot): Promise<void>;
  handleRead(options?: { record?: boolean }): Promise<ClipboardResponse>;
  handleWrite(content: string, mimeType: string, isEncoded: boolean): Promise<WriteResponse>;
  handleClientMessage(client: LiveClient, message: string): Promise<void>;
  closeAll(code?: number, reason?: string): void;
}

export function createBroadcastHub(options: BroadcastHubOptions): BroadcastHub {
  const { adapter, history, isHistoryEnabled } = options;
  const clients = new Set<LiveClient>();

  function unregister(client: LiveClient): void {
    if (clients.delete(client)) {
      log.debug("Client disconnected", { id: client.id, clients: clients.size });
    }
  }

  function drop(client: LiveClient, err: unknown): void {
    const failure: NetworkSendError = { kind: "NetworkSendError", message: errorMessage(err), clientId: client.id };
    log.error("Failed to send to websocket:", describeFailure(failure));
    unregister(client);
    try {
      client.close(1011, "send failed");
    } catch (closeErr) {
      log.debug("Close after send failure threw", errorMessage(closeErr));
    }
  }

  function sendTo(client: LiveClient, payload: string): Promise<void> {
    try {
      return client.send(payload);
    } catch (err) {
      return Promise.reject(err);
    }
  }

  async function broadcast(snapshot: ClipboardSnapshot): Promise<void> {
    if (clients.size === 0) return;
    const payload = JSON.stringify(toClipboardResponse(snapshot));
    const targets = Array.from(clients);
    // each send is issued synchronously here, so per-client order follows call order
    const results = await Promise.allSettled(targets.map((c) => sendTo(c, payload)));
    results.forEach((r, i) => {
      if (r.status === "rejected") drop(targets[i], r.reason);
    });
  }

  async function handleRead(opts: { record?: boolean } = {}): Promise<ClipboardResponse> {
    try {
      const snapshot = await adapter.read();
      if ((opts.record ?? true) && isHistoryEnabled() && snapshot.content) {
        history.add(snapshot.content, snapshot.mimeType, snapshot.isBinary);
      }
      return toClipboardResponse(snapshot);
    } catch (err) {
      log.error("get_clipboard error:", errorMessage(err));
      return clipboardError(errorMessage(err));
    }
  }

  async function handleWrite(content: string, mimeType: string, isEncoded: boolean): Promise<WriteResponse> {
    try {
      const outcome = await adapter.write(content, mimeType, isEncoded);
      if (outcome.ok) return { success: true };
      return { success: false, error: describeFailure(outcome.error) };
    } catch (err) {
      log.error("set_clipboard error:", errorMessage(err));
      return { success: false, error: errorMessage(err) };
    }
  }

  async function handleClientMessage(client: LiveClient, message: string): Promise<void> {
    if (message !== PING) return;
    try {
      await sendTo(client, PONG);
    } catch (err) {
      drop(client, err);
    }
  }

  return {
    register(client) {
      clients.add(client);
      log.debug("Client connected", { id: client.id, clients: clients.size });
    },
    unregister,
    clientCount: () => clients.size,
    broadcast,
    handleRead,
    handleWrite,
    handleClientMessage,
    closeAll(code = 1001, reason = "server shutting down") {
      for (const client of Array.from(clients)) {
        clients.delete(client);
        try {
          client.close(code, reason);
        } catch (err) {
          log.debug("Close threw", errorMessage(err));
        }
      }
    },
  };
}
