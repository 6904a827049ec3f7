// Public engine surface

export { makeBoard, tileAt, teleportPartner, checkStart } from "./board";
export { validateBoard } from "./validateBoard";
export { DIRECTIONS, directionDelta, stepPosition } from "./direction";
export { makePosition, positionsEqual, positionKey } from "./position";

// Movement rules
export { resolveMove } from "./resolveMove";

// Joint state + search
export type { Turn } from "./turn";
export { initialTurn, expandTurn, historyOf, hasVisited } from "./turn";
export type { SearchResult, SearchOptions } from "./search";
export { search, solve } from "./search";
export type { SearchObserver, GenerationInfo, LogFn } from "./observer";
export { createLogObserver } from "./observer";

// Deterministic joint-position key
export { jointKey } from "./stateHash";

// Board text
export type { ParsedBoard } from "./parseBoard";
export { parseBoard, parsePuzzle, parsePuzzleBoards } from "./parseBoard";
export { formatPath, parsePath, formatBoard } from "./serialization";

// Contract name: solvePuzzle
export type { PuzzleInput } from "./solvePuzzle";
export { solvePuzzle } from "./solvePuzzle";

// Errors + response envelope
export type { SolveResponse, EngineError, EngineErrorCode, BoardErrorCode } from "./errors";
export { BoardError, isBoardError } from "./errors";

// Replay + solution files
export type { ReplayResult } from "./replay";
export { replayPath, isWinningPath } from "./replay";
export { SOLUTION_FORMAT_VERSION } from "./replayFormat";
export type { SolutionFile } from "./replayFormat";
export type { SolutionVerification } from "./replayIO";
export { createSolutionFile, serializeSolution, deserializeSolution, verifySolutionFile } from "./replayIO";
export { validateSolutionFile } from "./replayValidate";
