import type { Direction, Puzzle } from "../types";
import { parsePuzzleBoards } from "./parseBoard";
import { isWinningPath, replayPath, type ReplayResult } from "./replay";
import { SOLUTION_FORMAT_VERSION, type SolutionFile } from "./replayFormat";
import { validateSolutionFile } from "./replayValidate";
import { formatBoard, formatPath, parsePath } from "./serialization";

export function createSolutionFile(
  puzzle: Puzzle,
  path: readonly Direction[],
  now: Date = new Date()
): SolutionFile {
  return {
    formatVersion: SOLUTION_FORMAT_VERSION,
    createdAt: now.toISOString(),
    boards: puzzle.boards.map((board, i) => formatBoard(board, puzzle.starts[i])),
    moves: formatPath(path),
  };
}

/**
 * Serialize a solution file to JSON.
 */
export function serializeSolution(file: SolutionFile): string {
  return JSON.stringify(file, null, 2);
}

/**
 * Deserialize JSON into a solution file and validate its shape.
 */
export function deserializeSolution(json: string): SolutionFile {
  const parsed: unknown = JSON.parse(json);
  validateSolutionFile(parsed);
  return parsed;
}

export type SolutionVerification = {
  wins: boolean;
  replay: ReplayResult;
};

/**
 * Re-parse the boards and replay the recorded moves.
 * Throws BoardError for malformed boards and Error for bad move letters.
 */
export function verifySolutionFile(file: SolutionFile): SolutionVerification {
  const puzzle = parsePuzzleBoards(file.boards);
  const path = parsePath(file.moves);
  return {
    wins: isWinningPath(puzzle, path),
    replay: replayPath(puzzle, path),
  };
}
