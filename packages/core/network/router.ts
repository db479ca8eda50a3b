import type { ZodType, ZodTypeDef } from "zod";
import { errorMessage } from "../errors";
import type { ClipboardHistory } from "../history/store";
import { createLogger } from "../logger";
import { MimeType } from "../models/enums";
import { settingsPatchSchema, type Settings, type SettingsPatch } from "../config/settings";
import type { BroadcastHub } from "./hub";
import {
  formatIssues,
  restoreRequestSchema,
  toHistoryWire,
  writeRequestSchema,
  type ErrorResponse,
  type HistoryResponse,
  type StatusResponse,
} from "./protocol";

const log = createLogger("http");

export interface RouteRequest {
  method: string;
  /** Path without query string */
  path: string;
  rawBody?: string;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

export interface SettingsAccess {
  get(): Settings;
  update(patch: SettingsPatch): Promise<{ settings: Settings; restartRequired: boolean }>;
}

export interface RouterDeps {
  hub: BroadcastHub;
  history: ClipboardHistory;
  status: () => Promise<StatusResponse>;
  settings: SettingsAccess;
}

export type Router = (req: RouteRequest) => Promise<RouteResponse>;

type Handler = (req: RouteRequest) => Promise<RouteResponse>;

type Parsed<T> = { ok: true; value: T } | { ok: false; response: RouteResponse };

function json(status: number, body: unknown): RouteResponse {
  return { status, body };
}

function errorBody(error: string): ErrorResponse {
  return { success: false, error };
}

function parseBody<T>(req: RouteRequest, schema: ZodType<T, ZodTypeDef, unknown>): Parsed<T> {
  let data: unknown;
  try {
    data = JSON.parse(req.rawBody ?? "");
  } catch {
    return { ok: false, response: json(400, errorBody("Request body must be JSON")) };
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    return { ok: false, response: json(400, errorBody(formatIssues(result.error))) };
  }
  return { ok: true, value: result.data };
}

/**
 * Maps `METHOD /path` to handlers. Handlers never throw out of the router:
 * an unexpected error becomes a 500 with `{ success: false, error }`.
 */
export function createRouter(deps: RouterDeps): Router {
  const { hub, history, settings } = deps;

  const routes: Record<string, Handler> = {
    "GET /api/clipboard": async () => json(200, await hub.handleRead({ record: true })),

    "POST /api/clipboard": async (req) => {
      const parsed = parseBody(req, writeRequestSchema);
      if (!parsed.ok) return parsed.response;
      const { content, type, is_base64 } = parsed.value;
      return json(200, await hub.handleWrite(content, type, is_base64));
    },

    "DELETE /api/clipboard": async () => json(200, await hub.handleWrite("", MimeType.Text, false)),

    "GET /api/status": async () => json(200, await deps.status()),

    "GET /api/history": async () => {
      const body: HistoryResponse = { success: true, history: history.list().map(toHistoryWire) };
      return json(200, body);
    },

    "DELETE /api/history": async () => {
      history.clear();
      return json(200, { success: true });
    },

    "POST /api/history/restore": async (req) => {
      const parsed = parseBody(req, restoreRequestSchema);
      if (!parsed.ok) return parsed.response;
      const { content, type, is_binary } = parsed.value;
      return json(200, await hub.handleWrite(content, type, is_binary));
    },

    "GET /api/settings": async () => json(200, settings.get()),

    "PUT /api/settings": async (req) => {
      const parsed = parseBody(req, settingsPatchSchema);
      if (!parsed.ok) return parsed.response;
      const { settings: saved, restartRequired } = await settings.update(parsed.value);
      return json(200, { success: true, settings: saved, restart_required: restartRequired });
    },
  };

  return async (req) => {
    const handler = routes[`${req.method.toUpperCase()} ${req.path}`];
    if (!handler) return json(404, errorBody(`No route for ${req.method} ${req.path}`));
    try {
      return await handler(req);
    } catch (err) {
      log.error(`${req.method} ${req.path} failed:`, errorMessage(err));
      return json(500, errorBody(errorMessage(err)));
    }
  };
}
