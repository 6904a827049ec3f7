import { BoardError, makeBoard, parseBoard, type ParsedBoard } from "../src/engine";
import { TILE_GLYPHS } from "../src/engine/parseBoard";
import type { Board, GridTile, Position, Puzzle } from "../src/types";

export const pos = (x: number, y: number): Position => ({ x, y });

/** Parse a board from its lines (first line holds the exit marker). */
export function board(...lines: string[]): ParsedBoard {
  return parseBoard(lines.join("\n"));
}

export function puzzleOf(...parsed: ParsedBoard[]): Puzzle {
  return {
    boards: parsed.map((p) => p.board),
    starts: parsed.map((p) => p.start),
  };
}

/** Build a grid directly from glyph rows, bypassing the parser. */
export function grid(rows: string[], exitColumn: number): Board {
  const tiles: GridTile[][] = rows.map((r) => Array.from(r, (ch) => TILE_GLYPHS[ch]));
  return makeBoard(tiles, exitColumn);
}

/** Code of the BoardError thrown by fn, or undefined if it did not throw. */
export function boardErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof BoardError) return err.code;
    throw err;
  }
  return undefined;
}

export function boardErrorOf(fn: () => unknown): BoardError {
  try {
    fn();
  } catch (err) {
    if (err instanceof BoardError) return err;
    throw err;
  }
  throw new Error("expected a BoardError");
}

// 5x5 open floor, exit above column 1, token at (3,4)
export const OPEN_5X5 = ["#E###", ".....", ".....", ".....", ".....", "...@."];

export const SINGLE = ["#E###", ".....", ".~.o.", "...@."];

// Two boards with no solution: A walks a 45-wide corridor one cell per move,
// B is boxed in and never moves. The search runs 45 generations before the
// frontier empties.
export const CORRIDOR_BOARDS = ["E\n@" + ".".repeat(44), "E.\n#@"];
