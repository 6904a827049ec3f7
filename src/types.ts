// src/types.ts

export type Tile = "open" | "wall" | "pit" | "ice" | "teleport" | "exit";

// The exit is never stored in the grid; it sits one row above it at exitColumn.
export type GridTile = Exclude<Tile, "exit">;

export type Direction = "up" | "down" | "left" | "right";

export interface Position {
  readonly x: number;
  readonly y: number;
}

export interface Board {
  readonly tiles: readonly (readonly GridTile[])[];
  readonly rows: number;
  readonly cols: number;
  readonly exitColumn: number;

  // Row-major cache of the cells tagged "teleport" (0 or 2 entries).
  readonly teleporters: readonly Position[];
}

export type MoveOutcome =
  | { readonly kind: "exited" }
  | { readonly kind: "dead" }
  | { readonly kind: "arrived"; readonly position: Position };

export type TurnStatus = "ongoing" | "failed" | "succeeded";

/**
 * One or two boards solved in lockstep. starts[i] is the token on boards[i].
 */
export interface Puzzle {
  readonly boards: readonly Board[];
  readonly starts: readonly Position[];
}
