/**
 * Parse boards from their text form.
 *
 * Format (one board):
 * - First line: the exit marker `E` at the exit column. Anything else on the
 *   line is decoration.
 * - Every following line is one grid row:
 *   * `.` open floor
 *   * `#` wall
 *   * `o` pit
 *   * `~` ice
 *   * `T` teleporter (exactly two, or none)
 *   * `@` the token's start (open floor underneath)
 *
 * A puzzle is one or two boards separated by blank lines; the tokens move in
 * lockstep.
 *
 * Example:
 *     #E###
 *     .....
 *     .~.o.
 *     ...@.
 */

import type { Board, GridTile, Position, Puzzle } from "../types";
import { makeBoard } from "./board";
import { BoardError } from "./errors";
import { makePosition } from "./position";

export const EXIT_MARKER = "E";
export const START_MARKER = "@";
export const MAX_BOARDS = 2;

export const TILE_GLYPHS: Readonly<Record<string, GridTile>> = Object.freeze({
  ".": "open",
  "#": "wall",
  o: "pit",
  "~": "ice",
  T: "teleport",
});

export type ParsedBoard = {
  board: Board;
  start: Position;
};

function toLines(text: string): string[] {
  const lines = text.split(/\r?\n/).map((l) => l.replace(/\s+$/, ""));
  while (lines.length > 0 && lines[0] === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function parseBoard(text: string): ParsedBoard {
  const lines = toLines(text);
  if (lines.length === 0) {
    throw new BoardError("EMPTY_INPUT", "Board text is empty.");
  }

  const [exitLine, ...rowLines] = lines;
  const exitColumn = exitLine.indexOf(EXIT_MARKER);
  if (exitColumn < 0) {
    throw new BoardError("MISSING_EXIT", `First line has no exit marker '${EXIT_MARKER}': "${exitLine}"`, {
      row: -1,
    });
  }

  let start: Position | undefined;
  const tiles: GridTile[][] = [];

  for (let y = 0; y < rowLines.length; y++) {
    const rowStr = rowLines[y];
    const row: GridTile[] = [];

    for (let x = 0; x < rowStr.length; x++) {
      const ch = rowStr[x];

      if (ch === START_MARKER) {
        if (start) {
          throw new BoardError(
            "DUPLICATE_START",
            `Second start marker at (${x},${y}); first was at (${start.x},${start.y}).`,
            { row: y, col: x }
          );
        }
        start = makePosition(x, y);
        row.push("open");
        continue;
      }

      const tile = Object.prototype.hasOwnProperty.call(TILE_GLYPHS, ch) ? TILE_GLYPHS[ch] : undefined;
      if (!tile) {
        throw new BoardError(
          "UNKNOWN_TILE",
          `Invalid tile '${ch}' at row ${y}, column ${x}: "${rowStr}"\n` +
            `  Valid tiles: '.' open, '#' wall, 'o' pit, '~' ice, 'T' teleporter, '@' start`,
          { row: y, col: x }
        );
      }
      row.push(tile);
    }

    if (tiles.length > 0 && row.length !== tiles[0].length) {
      throw new BoardError(
        "RAGGED_ROWS",
        `Row ${y} has ${row.length} tiles, expected ${tiles[0].length} (from row 0): "${rowStr}"`,
        { row: y }
      );
    }
    tiles.push(row);
  }

  if (!start) {
    throw new BoardError("MISSING_START", `No start marker '${START_MARKER}' on the board.`);
  }

  return { board: makeBoard(tiles, exitColumn), start };
}

/**
 * Split puzzle text into board blocks on blank lines and parse each one.
 */
export function parsePuzzle(text: string): Puzzle {
  const blocks: string[] = [];
  let current: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") {
      if (current.length > 0) blocks.push(current.join("\n"));
      current = [];
    } else {
      current.push(line);
    }
  }
  if (current.length > 0) blocks.push(current.join("\n"));

  if (blocks.length === 0) {
    throw new BoardError("EMPTY_INPUT", "Puzzle text is empty.");
  }

  return parsePuzzleBoards(blocks);
}

/**
 * Parse one board per entry. Errors are tagged with the board index.
 */
export function parsePuzzleBoards(texts: readonly string[]): Puzzle {
  if (texts.length === 0) {
    throw new BoardError("EMPTY_INPUT", "Puzzle has no boards.");
  }
  if (texts.length > MAX_BOARDS) {
    throw new BoardError("TOO_MANY_BOARDS", `Puzzle has ${texts.length} boards; at most ${MAX_BOARDS} are supported.`);
  }

  const boards: Board[] = [];
  const starts: Position[] = [];

  texts.forEach((text, i) => {
    try {
      const parsed = parseBoard(text);
      boards.push(parsed.board);
      starts.push(parsed.start);
    } catch (err) {
      if (err instanceof BoardError) throw err.onBoard(i);
      throw err;
    }
  });

  return { boards, starts };
}
