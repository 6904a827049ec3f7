import type { Direction, Position, Puzzle, TurnStatus } from "../types";
import { expandTurn, initialTurn } from "./turn";

export type ReplayResult = {
  /** Status of the last turn reached. */
  status: TurnStatus;

  /** Moves consumed before the turn stopped being ongoing (or the path ended). */
  movesApplied: number;

  /** Token positions after the last move that left every token on its board. */
  positions: readonly Position[];
};

/**
 * Replay a move list through the same rules the search uses, visited-set
 * pruning included.
 */
export function replayPath(puzzle: Puzzle, path: readonly Direction[]): ReplayResult {
  let turn = initialTurn(puzzle);
  let movesApplied = 0;

  for (const direction of path) {
    if (turn.status !== "ongoing") break;
    turn = expandTurn(turn, direction);
    movesApplied++;
  }

  return { status: turn.status, movesApplied, positions: turn.positions };
}

export function isWinningPath(puzzle: Puzzle, path: readonly Direction[]): boolean {
  const r = replayPath(puzzle, path);
  return r.status === "succeeded" && r.movesApplied === path.length;
}
