// src/engine/search.ts

import type { Direction } from "../types";
import { DIRECTIONS } from "./direction";
import type { SearchObserver } from "./observer";
import { expandTurn, historyOf, type Turn } from "./turn";

export type SearchResult =
  | { status: "solved"; path: readonly Direction[]; generations: number }
  | { status: "unsolvable"; generations: number }
  | { status: "limitReached"; generations: number };

export type SearchOptions = {
  /**
   * Stop after this many generations without a success.
   * Unset (or 0) searches until success or exhaustion.
   */
  maxGenerations?: number;

  observer?: SearchObserver;
};

/**
 * Breadth-first frontier search.
 *
 * Success is only checked once a whole generation is built, and children are
 * produced in DIRECTIONS order, so the first success found is fixed by the
 * board alone. Pruning is per lineage (a turn's own visited set), not global.
 */
export function search(initial: Turn, options: SearchOptions = {}): SearchResult {
  const { observer } = options;
  const limit = options.maxGenerations && options.maxGenerations > 0 ? options.maxGenerations : undefined;

  let frontier: Turn[] = [initial];
  let generation = 0;

  const finish = (result: SearchResult): SearchResult => {
    observer?.onFinished?.(result);
    return result;
  };

  for (;;) {
    if (frontier.length === 0) {
      return finish({ status: "unsolvable", generations: generation });
    }

    const winner = frontier.find((t) => t.status === "succeeded");
    if (winner) {
      return finish({ status: "solved", path: historyOf(winner), generations: generation });
    }

    if (limit !== undefined && generation >= limit) {
      return finish({ status: "limitReached", generations: generation });
    }

    const next: Turn[] = [];
    let pruned = 0;

    for (const turn of frontier) {
      if (turn.status !== "ongoing") continue;

      for (const direction of DIRECTIONS) {
        const child = expandTurn(turn, direction);
        if (child.status === "failed") pruned++;
        else next.push(child);
      }
    }

    generation++;
    observer?.onGeneration?.({ generation, frontierSize: next.length, pruned });
    frontier = next;
  }
}

/**
 * Moves that bring every token to its exit on the same move, or null.
 */
export function solve(initial: Turn, options: SearchOptions = {}): Direction[] | null {
  const result = search(initial, options);
  return result.status === "solved" ? [...result.path] : null;
}
