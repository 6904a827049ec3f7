import type { Position } from "../types";

export function makePosition(x: number, y: number): Position {
  return { x, y };
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * String key for use in Sets or Maps.
 */
export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}
