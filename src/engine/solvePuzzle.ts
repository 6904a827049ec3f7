// src/engine/solvePuzzle.ts
//
// Public solve entry. This is the only place parse + search are combined.

import type { Puzzle } from "../types";
import { checkStart } from "./board";
import { isBoardError, type SolveResponse } from "./errors";
import { parsePuzzle, parsePuzzleBoards } from "./parseBoard";
import { search, type SearchOptions } from "./search";
import { initialTurn } from "./turn";
import { validateBoard } from "./validateBoard";

/**
 * Puzzle text (one or two boards separated by blank lines), one text per
 * board, or an already parsed puzzle.
 */
export type PuzzleInput = string | readonly string[] | Puzzle;

function toPuzzle(input: PuzzleInput): Puzzle {
  if (typeof input === "string") return parsePuzzle(input);
  if (isPuzzle(input)) {
    input.boards.forEach((board, i) => {
      validateBoard(board, `solvePuzzle board ${i}`);
      const start = input.starts[i];
      if (!start) return;
      try {
        checkStart(board, start);
      } catch (err) {
        throw isBoardError(err) ? err.onBoard(i) : err;
      }
    });
    return input;
  }
  return parsePuzzleBoards(input);
}

function isPuzzle(input: readonly string[] | Puzzle): input is Puzzle {
  return "boards" in input && "starts" in input;
}

/**
 * Contract name: solvePuzzle
 *
 * - Malformed boards: { ok: false, error } with a distinct code.
 * - No solution: { ok: true, result: { status: "unsolvable" } }, never an error.
 * - Anything else thrown is a bug and propagates.
 */
export function solvePuzzle(input: PuzzleInput, options: SearchOptions = {}): SolveResponse {
  try {
    const puzzle = toPuzzle(input);
    const result = search(initialTurn(puzzle), options);
    return { ok: true, result };
  } catch (err) {
    if (!isBoardError(err)) throw err;
    return {
      ok: false,
      error: { code: err.code, message: err.message, location: err.location },
    };
  }
}
