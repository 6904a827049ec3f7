// src/engine/resolveMove.ts

import type { Board, Direction, MoveOutcome, Position } from "../types";
import { tileAt, teleportPartner } from "./board";
import { stepPosition } from "./direction";
import { BoardError } from "./errors";

const EXITED: MoveOutcome = Object.freeze({ kind: "exited" });
const DEAD: MoveOutcome = Object.freeze({ kind: "dead" });

function arrived(position: Position): MoveOutcome {
  return { kind: "arrived", position };
}

/**
 * Move one token one step and report what happens to it.
 *
 * - open: lands on the new cell
 * - wall: stays put (the move is still spent)
 * - pit: dead
 * - exit: exited
 * - teleport: lands on the partner teleporter
 * - ice: keeps going the same way until something else stops it; a wall stops
 *   it on the last ice tile
 */
export function resolveMove(direction: Direction, board: Board, from: Position): MoveOutcome {
  let current = from;

  // A slide moves in a straight line and teleporting ends it, so it crosses at
  // most rows + cols cells before leaving the grid.
  for (let remaining = board.rows + board.cols + 2; remaining > 0; remaining--) {
    const to = stepPosition(current, direction);

    switch (tileAt(board, to)) {
      case "open":
        return arrived(to);
      case "wall":
        return arrived(current);
      case "pit":
        return DEAD;
      case "exit":
        return EXITED;
      case "teleport":
        return arrived(teleportPartner(board, to));
      case "ice":
        current = to;
        break;
    }
  }

  throw new BoardError(
    "ENDLESS_SLIDE",
    `Slide ${direction} from (${from.x},${from.y}) did not stop.`,
    { row: from.y, col: from.x }
  );
}
