import http from "node:http";
import type { Duplex } from "node:stream";
import { v4 as uuidv4 } from "uuid";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { BroadcastHub, LiveClient } from "./hub";
import type { Router } from "./router";

const log = createLogger("http");

export const WS_PATH = "/api/ws";
/** Image uploads arrive as base64 JSON */
export const MAX_BODY_BYTES = 50 * 1024 * 1024;
const TERMINATE_GRACE_MS = 1_000;

export interface ClipboardServerOptions {
  router: Router;
  hub: BroadcastHub;
}

export interface ClipboardServer {
  listen(port: number, host: string): Promise<void>;
  /** Stops accepting work, drains in-flight requests, then closes every connection. */
  close(): Promise<void>;
  isRunning(): boolean;
  /** Bound port, useful when listening on port 0 */
  port(): number | undefined;
}

class BodyTooLargeError extends Error {}

/**
 * Past the limit the rest of the body is read and discarded, so the socket
 * stays usable for the 413 reply.
 */
function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    let chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        chunks = [];
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (size > limit) reject(new BodyTooLargeError(`Request body exceeds ${limit} bytes`));
      else resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload),
    "Access-Control-Allow-Origin": "*",
  });
  res.end(payload);
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

function toLiveClient(socket: WebSocket): LiveClient {
  return {
    id: uuidv4(),
    send: (payload) =>
      new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error("socket is not open"));
          return;
        }
        socket.send(payload, (err) => (err ? reject(err) : resolve()));
      }),
    close: (code, reason) => socket.close(code, reason),
  };
}

export function createClipboardServer(options: ClipboardServerOptions): ClipboardServer {
  const { router, hub } = options;
  const inFlight = new Set<Promise<void>>();
  let closing = false;
  let httpServer: http.Server | null = null;
  let wss: WebSocketServer | null = null;

  async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    if (closing) {
      sendJson(res, 503, { success: false, error: "Server is shutting down" });
      return;
    }
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    if (method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      res.end();
      return;
    }

    let rawBody: string | undefined;
    if (method === "POST" || method === "PUT") {
      try {
        rawBody = await readBody(req, MAX_BODY_BYTES);
      } catch (err) {
        const status = err instanceof BodyTooLargeError ? 413 : 400;
        sendJson(res, status, { success: false, error: errorMessage(err) });
        return;
      }
    }

    const response = await router({ method, path: url.pathname, rawBody });
    sendJson(res, response.status, response.body);
  }

  function track(req: http.IncomingMessage, res: http.ServerResponse): void {
    const task = handleRequest(req, res).catch((err: unknown) => {
      log.error("Request handler failed:", errorMessage(err));
      if (!res.headersSent) sendJson(res, 500, { success: false, error: errorMessage(err) });
    });
    inFlight.add(task);
    void task.finally(() => inFlight.delete(task));
  }

  function attachSocket(socket: WebSocket): void {
    const client = toLiveClient(socket);
    hub.register(client);

    socket.on("message", (data, isBinary) => {
      if (isBinary) return;
      void hub.handleClientMessage(client, rawToString(data));
    });
    socket.on("close", () => hub.unregister(client));
    socket.on("error", (err) => {
      log.error("ws connection closed with exception", errorMessage(err));
      hub.unregister(client);
    });
  }

  function handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (closing || !wss || url.pathname !== WS_PATH) {
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    const server = wss;
    server.handleUpgrade(req, socket, head, (ws) => server.emit("connection", ws, req));
  }

  return {
    async listen(port, host) {
      if (httpServer) {
        log.warn("WebServer already running");
        return;
      }
      closing = false;
      const server = http.createServer(track);
      const sockets = new WebSocketServer({ noServer: true });
      sockets.on("connection", attachSocket);
      server.on("upgrade", handleUpgrade);

      log.info(`Starting web server on port ${port}`);
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
          server.off("error", reject);
          resolve();
        });
      });
      server.on("error", (err) => log.error("Server error:", errorMessage(err)));
      httpServer = server;
      wss = sockets;
      log.info(`Web server listening on ${host}:${port}`);
    },

    async close() {
      const server = httpServer;
      const sockets = wss;
      if (!server || !sockets) return;
      log.info("Stopping web server");
      closing = true;

      const closed = new Promise<void>((resolve) => {
        server.close((err) => {
          if (err) log.warn("Error during cleanup:", errorMessage(err));
          resolve();
        });
      });
      server.closeIdleConnections();

      await Promise.allSettled(Array.from(inFlight));

      hub.closeAll();
      const stragglers = setTimeout(() => {
        sockets.clients.forEach((ws) => ws.terminate());
      }, TERMINATE_GRACE_MS);
      await new Promise<void>((resolve) => sockets.close(() => resolve()));
      server.closeAllConnections();
      await closed;
      clearTimeout(stragglers);

      httpServer = null;
      wss = null;
    },

    isRunning: () => httpServer !== null && httpServer.listening,

    port() {
      const addr = httpServer?.address();
      return addr && typeof addr === "object" ? addr.port : undefined;
    },
  };
}
