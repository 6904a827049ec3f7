// src/server/protocol.ts

import type { EngineErrorCode } from "../engine";
import type { BoardLocation } from "../engine/errors";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage = HelloMessage | SolveMessage | VerifyMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/**
 * Solve a puzzle. Exactly one of (puzzle, boards) must be present:
 * - puzzle: one text, boards separated by blank lines
 * - boards: one text per board
 */
export interface SolveMessage {
  type: "solve";
  puzzle?: string;
  boards?: string[];

  /** Per-request cap; the server's own cap applies when lower. */
  maxGenerations?: number;
  reqId?: string;
}

/**
 * Check a move list ("UDLR" letters) against a puzzle.
 */
export interface VerifyMessage {
  type: "verify";
  boards: string[];
  moves: string;
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage = WelcomeMessage | SolutionMessage | VerificationMessage | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  clientId?: string;
  reqId?: string;
}

export interface SolutionMessage {
  type: "solution";
  status: "solved" | "unsolvable" | "limitReached";

  /** Compact move list when solved, otherwise null. */
  moves: string | null;
  generations: number;
  reqId?: string;
}

export interface VerificationMessage {
  type: "verification";
  wins: boolean;
  status: "ongoing" | "failed" | "succeeded";
  movesApplied: number;
  reqId?: string;
}

export type ServerErrorCode = EngineErrorCode | "BAD_MESSAGE" | "BAD_MOVES";

export interface ErrorMessage {
  type: "error";
  code: ServerErrorCode;
  message: string;
  location?: BoardLocation;
  reqId?: string;
}
