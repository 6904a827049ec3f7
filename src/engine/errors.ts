import type { SearchResult } from "./search";

export type BoardErrorCode =
  | "EMPTY_INPUT"
  | "MISSING_EXIT"
  | "MISSING_START"
  | "DUPLICATE_START"
  | "UNKNOWN_TILE"
  | "RAGGED_ROWS"
  | "MISSING_TELEPORTER"
  | "TOO_MANY_TELEPORTERS"
  | "EXIT_OUT_OF_RANGE"
  | "TOO_MANY_BOARDS"
  | "INVALID_START"
  | "ENDLESS_SLIDE";

export type BoardLocation = {
  board?: number;
  row?: number;
  col?: number;
};

/**
 * Malformed board input. Always fatal to the solve attempt that raised it.
 */
export class BoardError extends Error {
  readonly code: BoardErrorCode;
  readonly location: BoardLocation;

  constructor(code: BoardErrorCode, message: string, location: BoardLocation = {}) {
    super(message);
    this.name = "BoardError";
    this.code = code;
    this.location = location;
  }

  /** Copy of this error tagged with the index of the board it came from. */
  onBoard(board: number): BoardError {
    return new BoardError(this.code, `board ${board}: ${this.message}`, { ...this.location, board });
  }
}

export function isBoardError(x: unknown): x is BoardError {
  return x instanceof BoardError;
}

export type EngineErrorCode = BoardErrorCode;

export type EngineError = {
  code: EngineErrorCode;
  message: string;
  location?: BoardLocation;
};

export type SolveOk = {
  ok: true;
  result: SearchResult;
};

export type SolveErr = {
  ok: false;
  error: EngineError;
};

export type SolveResponse = SolveOk | SolveErr;
