import type { ClientMessage, ServerMessage, SolveMessage, VerifyMessage } from "./protocol";
import {
  solvePuzzle,
  parsePuzzleBoards,
  parsePath,
  replayPath,
  isWinningPath,
  isBoardError,
  formatPath,
  type SearchObserver,
} from "../engine";
import type { Direction, Puzzle } from "../types";

export const SERVER_VERSION = "tilewalk-ws-0.1.0";

export type HandlerContext = {
  /** Server-wide generation cap; 0 = unbounded. */
  maxGenerations: number;
  observer?: SearchObserver;
};

function withReqId<T extends ServerMessage>(msg: T, reqId?: string): T {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

/**
 * The lower of the server cap and the request cap, ignoring unset/zero values.
 */
export function effectiveLimit(serverCap: number, requested?: number): number {
  const req = requested && requested > 0 ? requested : 0;
  if (serverCap <= 0) return req;
  if (req <= 0) return serverCap;
  return Math.min(serverCap, req);
}

function handleSolve(msg: SolveMessage, ctx: HandlerContext): ServerMessage {
  const input = msg.puzzle ?? msg.boards ?? [];
  const response = solvePuzzle(input, {
    maxGenerations: effectiveLimit(ctx.maxGenerations, msg.maxGenerations),
    observer: ctx.observer,
  });

  if (!response.ok) {
    return withReqId(
      { type: "error", code: response.error.code, message: response.error.message, location: response.error.location },
      msg.reqId
    );
  }

  const { result } = response;
  return withReqId(
    {
      type: "solution",
      status: result.status,
      moves: result.status === "solved" ? formatPath(result.path) : null,
      generations: result.generations,
    },
    msg.reqId
  );
}

function handleVerify(msg: VerifyMessage): ServerMessage {
  let puzzle: Puzzle;
  try {
    puzzle = parsePuzzleBoards(msg.boards);
  } catch (err) {
    if (!isBoardError(err)) throw err;
    return withReqId({ type: "error", code: err.code, message: err.message, location: err.location }, msg.reqId);
  }

  let path: Direction[];
  try {
    path = parsePath(msg.moves);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return withReqId({ type: "error", code: "BAD_MOVES", message }, msg.reqId);
  }

  const replay = replayPath(puzzle, path);
  return withReqId(
    {
      type: "verification",
      wins: isWinningPath(puzzle, path),
      status: replay.status,
      movesApplied: replay.movesApplied,
    },
    msg.reqId
  );
}

/**
 * Pure request handler: one client message in, one server message out.
 */
export function handleClientMessage(msg: ClientMessage, ctx: HandlerContext): ServerMessage {
  switch (msg.type) {
    case "hello":
      return withReqId({ type: "welcome", serverVersion: SERVER_VERSION, clientId: msg.clientId ?? "anon" }, msg.reqId);
    case "solve":
      return handleSolve(msg, ctx);
    case "verify":
      return handleVerify(msg);
  }
}
