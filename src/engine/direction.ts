// src/engine/direction.ts

import type { Direction, Position } from "../types";
import { makePosition } from "./position";

// Search enumeration order. Ties between same-generation successes are broken by it.
export const DIRECTIONS: readonly Direction[] = ["up", "down", "right", "left"];

const DELTAS: Record<Direction, Position> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function directionDelta(direction: Direction): Position {
  return DELTAS[direction];
}

export function stepPosition(from: Position, direction: Direction): Position {
  const d = directionDelta(direction);
  return makePosition(from.x + d.x, from.y + d.y);
}
