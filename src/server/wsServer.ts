import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { ClientMessage, ServerMessage } from "./protocol";
import { handleClientMessage, SERVER_VERSION, type HandlerContext } from "./handleMessage";
import type { SearchObserver } from "../engine";
import { DEFAULT_WS_MAX_GENERATIONS } from "../config";

export type WsServerOptions = {
  port: number;

  /** Server-wide generation cap; 0 = unbounded, DEFAULT_WS_MAX_GENERATIONS when unset. */
  maxGenerations?: number;
  observer?: SearchObserver;
};

export type RunningWsServer = {
  port: number;
  close: () => Promise<void>;
};

type JsonParse = { ok: true; value: unknown } | { ok: false };

function safeParseJson(raw: string): JsonParse {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x["reqId"];
  return typeof v === "string" ? v : undefined;
}

function isStringArray(x: unknown): x is string[] {
  return Array.isArray(x) && x.every((s) => typeof s === "string");
}

function optional(x: Record<string, unknown>, key: string, check: (v: unknown) => boolean): boolean {
  return !(key in x) || check(x[key]);
}

export function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if (!optional(x, "reqId", (v) => typeof v === "string")) return false;

  switch (x["type"]) {
    case "hello":
      // keep permissive; clientId optional
      return optional(x, "clientId", (v) => typeof v === "string");

    case "solve": {
      const hasPuzzle = "puzzle" in x;
      const hasBoards = "boards" in x;
      if (hasPuzzle === hasBoards) return false;
      return (
        optional(x, "puzzle", (v) => typeof v === "string") &&
        optional(x, "boards", isStringArray) &&
        optional(x, "maxGenerations", (v) => Number.isInteger(v))
      );
    }

    case "verify":
      return isStringArray(x["boards"]) && typeof x["moves"] === "string";

    default:
      return false;
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

function makeError(message: string, reqId?: string): ServerMessage {
  const msg: ServerMessage = { type: "error", code: "BAD_MESSAGE", message };
  return reqId ? { ...msg, reqId } : msg;
}

/**
 * Solve service. Each request is answered on the socket it came in on; the
 * search runs synchronously inside the message handler.
 */
export function startWsServer(opts: WsServerOptions): RunningWsServer {
  const wss = new WebSocketServer({ port: opts.port });
  const ctx: HandlerContext = {
    maxGenerations: opts.maxGenerations ?? DEFAULT_WS_MAX_GENERATIONS,
    observer: opts.observer,
  };

  wss.on("connection", (ws) => {
    // welcome-on-connect
    send(ws, { type: "welcome", serverVersion: SERVER_VERSION, clientId: "anon" });

    ws.on("message", (data) => {
      const raw = rawToString(data);
      const json = safeParseJson(raw);

      if (!json.ok) {
        send(ws, makeError("Invalid JSON."));
        return;
      }

      const parsed = json.value;
      const reqId = getReqId(parsed);

      if (!isClientMessage(parsed)) {
        const t = isPlainObject(parsed) ? parsed["type"] : undefined;
        send(ws, makeError(`Invalid client message shape. type=${String(t)} typeof=${typeof t}`, reqId));
        return;
      }

      send(ws, handleClientMessage(parsed, ctx));
    });

    ws.on("error", (err) => {
      console.error("[wsServer] socket error", err);
    });
  });

  const address = wss.address();
  const port = typeof address === "object" && address !== null ? address.port : opts.port;

  return {
    port,
    close: async () => {
      for (const ws of wss.clients) ws.close();
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
