// src/engine/board.ts

import type { Board, GridTile, Position, Tile } from "../types";
import { BoardError } from "./errors";
import { makePosition, positionsEqual } from "./position";
import { validateBoard } from "./validateBoard";

/**
 * Build an immutable Board from a rectangular grid.
 *
 * Throws BoardError for an empty or ragged grid, an exit column outside the
 * grid's columns, or a teleporter count other than 0 or 2.
 */
export function makeBoard(tiles: readonly (readonly GridTile[])[], exitColumn: number): Board {
  if (tiles.length === 0 || tiles[0].length === 0) {
    throw new BoardError("EMPTY_INPUT", "Board has no tiles.");
  }

  const rows = tiles.length;
  const cols = tiles[0].length;

  for (let y = 0; y < rows; y++) {
    if (tiles[y].length !== cols) {
      throw new BoardError(
        "RAGGED_ROWS",
        `Row ${y} has ${tiles[y].length} tiles, expected ${cols}.`,
        { row: y }
      );
    }
  }

  if (!Number.isInteger(exitColumn) || exitColumn < 0 || exitColumn >= cols) {
    throw new BoardError(
      "EXIT_OUT_OF_RANGE",
      `Exit column ${exitColumn} is outside the grid (0..${cols - 1}).`,
      { col: exitColumn }
    );
  }

  const teleporters: Position[] = [];
  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < cols; x++) {
      if (tiles[y][x] === "teleport") teleporters.push(makePosition(x, y));
    }
  }

  if (teleporters.length === 1) {
    const [only] = teleporters;
    throw new BoardError("MISSING_TELEPORTER", "Teleporter has no partner.", { row: only.y, col: only.x });
  }
  if (teleporters.length > 2) {
    const third = teleporters[2];
    throw new BoardError(
      "TOO_MANY_TELEPORTERS",
      `Found ${teleporters.length} teleporters; a board holds at most one pair.`,
      { row: third.y, col: third.x }
    );
  }

  const board: Board = Object.freeze({
    tiles: Object.freeze(tiles.map((row) => Object.freeze([...row]))),
    rows,
    cols,
    exitColumn,
    teleporters: Object.freeze(teleporters.map((p) => Object.freeze(p))),
  });

  validateBoard(board, "makeBoard");
  return board;
}

/**
 * Tile at any integer coordinate. The grid is walled on every side except one
 * gap above row 0 at the exit column.
 */
export function tileAt(board: Board, p: Position): Tile {
  if (p.y === -1) return p.x === board.exitColumn ? "exit" : "wall";
  if (p.y < -1 || p.y >= board.rows || p.x < 0 || p.x >= board.cols) return "wall";
  return board.tiles[p.y][p.x];
}

/**
 * Throws INVALID_START unless the token starts inside the grid on a cell it
 * can stand on (anything but wall or pit).
 */
export function checkStart(board: Board, start: Position): void {
  const inside =
    Number.isInteger(start.x) &&
    Number.isInteger(start.y) &&
    start.y >= 0 &&
    start.y < board.rows &&
    start.x >= 0 &&
    start.x < board.cols;

  if (!inside) {
    throw new BoardError("INVALID_START", `Start (${start.x},${start.y}) is outside the grid.`, {
      row: start.y,
      col: start.x,
    });
  }

  const tile = tileAt(board, start);
  if (tile === "wall" || tile === "pit") {
    throw new BoardError("INVALID_START", `Start (${start.x},${start.y}) is on a ${tile} tile.`, {
      row: start.y,
      col: start.x,
    });
  }
}

export function teleportPartner(board: Board, from: Position): Position {
  if (board.teleporters.length !== 2) {
    throw new BoardError(
      "MISSING_TELEPORTER",
      `Board has ${board.teleporters.length} teleporters; a teleporter needs exactly one partner.`,
      { row: from.y, col: from.x }
    );
  }

  const [a, b] = board.teleporters;
  if (positionsEqual(a, from)) return b;
  if (positionsEqual(b, from)) return a;

  throw new BoardError("MISSING_TELEPORTER", `No teleporter at (${from.x},${from.y}).`, {
    row: from.y,
    col: from.x,
  });
}
