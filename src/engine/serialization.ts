import type { Board, Direction, GridTile, Position } from "../types";
import { EXIT_MARKER, START_MARKER } from "./parseBoard";

const LETTERS: Record<Direction, string> = {
  up: "U",
  down: "D",
  left: "L",
  right: "R",
};

const FROM_LETTER: Readonly<Record<string, Direction>> = {
  U: "up",
  D: "down",
  L: "left",
  R: "right",
};

const GLYPHS: Record<GridTile, string> = {
  open: ".",
  wall: "#",
  pit: "o",
  ice: "~",
  teleport: "T",
};

/** "UURL"-style compact form of a move list. */
export function formatPath(path: readonly Direction[]): string {
  return path.map((d) => LETTERS[d]).join("");
}

export function parsePath(text: string): Direction[] {
  const out: Direction[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const d = Object.prototype.hasOwnProperty.call(FROM_LETTER, ch) ? FROM_LETTER[ch] : undefined;
    if (!d) throw new Error(`Invalid move letter '${ch}' at index ${i} (expected U, D, L or R).`);
    out.push(d);
  }
  return out;
}

/**
 * Board back to its text form (inverse of parseBoard). The exit line is drawn
 * as walls with the marker in the gap.
 */
export function formatBoard(board: Board, start: Position): string {
  const exitLine = Array.from({ length: board.cols }, (_, x) => (x === board.exitColumn ? EXIT_MARKER : "#")).join("");

  const rows = board.tiles.map((row, y) =>
    row.map((tile, x) => (x === start.x && y === start.y ? START_MARKER : GLYPHS[tile])).join("")
  );

  return [exitLine, ...rows].join("\n");
}
