// src/engine/turn.ts
//
// Joint search state. history and visited are persistent cons lists: a child
// points at its parent's lists and never mutates them, so siblings cannot see
// each other's additions.

import type { Board, Direction, MoveOutcome, Position, Puzzle, TurnStatus } from "../types";
import { resolveMove } from "./resolveMove";
import { jointKey } from "./stateHash";

type HistoryNode = {
  readonly direction: Direction;
  readonly prev: HistoryNode | null;
  readonly length: number;
};

type VisitedNode = {
  readonly key: string;
  readonly prev: VisitedNode | null;
};

export interface Turn {
  readonly boards: readonly Board[];
  readonly positions: readonly Position[];
  readonly status: TurnStatus;
  readonly history: HistoryNode | null;
  readonly visited: VisitedNode;
}

export function initialTurn(puzzle: Puzzle): Turn {
  if (puzzle.boards.length === 0) {
    throw new Error("[initialTurn] puzzle has no boards");
  }
  if (puzzle.boards.length !== puzzle.starts.length) {
    throw new Error(
      `[initialTurn] ${puzzle.boards.length} boards but ${puzzle.starts.length} start positions`
    );
  }

  return {
    boards: puzzle.boards,
    positions: puzzle.starts,
    status: "ongoing",
    history: null,
    visited: { key: jointKey(puzzle.starts), prev: null },
  };
}

function visitedHas(node: VisitedNode | null, key: string): boolean {
  for (let n = node; n; n = n.prev) {
    if (n.key === key) return true;
  }
  return false;
}

export function hasVisited(turn: Turn, positions: readonly Position[]): boolean {
  return visitedHas(turn.visited, jointKey(positions));
}

export function historyOf(turn: Turn): Direction[] {
  const out: Direction[] = [];
  for (let n = turn.history; n; n = n.prev) out.push(n.direction);
  return out.reverse();
}

export function historyLength(turn: Turn): number {
  return turn.history ? turn.history.length : 0;
}

/**
 * Apply one direction to every tracked token and produce the child turn.
 *
 * All tokens exit on this move: succeeded. Any token dies, or only some exit:
 * failed. Otherwise the new joint position must be unseen in this lineage.
 */
export function expandTurn(turn: Turn, direction: Direction): Turn {
  if (turn.status !== "ongoing") {
    throw new Error(`[expandTurn] cannot expand a ${turn.status} turn`);
  }

  const outcomes: MoveOutcome[] = turn.boards.map((board, i) =>
    resolveMove(direction, board, turn.positions[i])
  );

  const history: HistoryNode = {
    direction,
    prev: turn.history,
    length: historyLength(turn) + 1,
  };

  const finish = (status: TurnStatus): Turn => ({ ...turn, status, history });

  if (outcomes.every((o) => o.kind === "exited")) return finish("succeeded");

  const positions: Position[] = [];
  for (const o of outcomes) {
    // dead, or exited while another token did not
    if (o.kind !== "arrived") return finish("failed");
    positions.push(o.position);
  }

  const key = jointKey(positions);
  if (visitedHas(turn.visited, key)) return finish("failed");

  return {
    boards: turn.boards,
    positions,
    status: "ongoing",
    history,
    visited: { key, prev: turn.visited },
  };
}
