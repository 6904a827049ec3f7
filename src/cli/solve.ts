// src/cli/solve.ts
//
// Usage:
//   solve <puzzle-file> [--save <solution.json>] [--max-generations N] [--trace]
//   verify <solution.json>
//   help
//
// Env:
//   TILEWALK_MAX_GENERATIONS=0   (default cap; --max-generations overrides)
//   TILEWALK_TRACE=1             (same as --trace)
//
// Exit codes: 0 solved/verified, 1 no solution or not a winning path,
// 2 usage error or malformed input.

import { loadConfig, type Env } from "../config";
import {
  createLogObserver,
  createSolutionFile,
  deserializeSolution,
  formatPath,
  isBoardError,
  parsePath,
  parsePuzzle,
  serializeSolution,
  solvePuzzle,
  verifySolutionFile,
} from "../engine";
import type { Puzzle } from "../types";

export type CliIO = {
  readFile: (path: string) => string;
  writeFile: (path: string, data: string) => void;
  out: (line: string) => void;
  err: (line: string) => void;
  env: Env;
  now?: () => Date;
};

export const EXIT_OK = 0;
export const EXIT_NO_SOLUTION = 1;
export const EXIT_USAGE = 2;

const USAGE =
  "Usage:\n" +
  "  solve <puzzle-file> [--save <solution.json>] [--max-generations N] [--trace]\n" +
  "  verify <solution.json>\n" +
  "  help";

type SolveArgs = {
  file: string;
  save?: string;
  maxGenerations?: number;
  trace: boolean;
};

function parseSolveArgs(args: readonly string[]): SolveArgs | string {
  let file: string | undefined;
  let save: string | undefined;
  let maxGenerations: number | undefined;
  let trace = false;

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === "--trace") {
      trace = true;
    } else if (a === "--save") {
      save = args[++i];
      if (!save) return "--save needs a file name";
    } else if (a === "--max-generations") {
      const n = Number(args[++i]);
      if (!Number.isInteger(n) || n < 0) return "--max-generations needs a non-negative integer";
      maxGenerations = n;
    } else if (a.startsWith("--")) {
      return `unknown option ${a}`;
    } else if (file === undefined) {
      file = a;
    } else {
      return `unexpected argument ${a}`;
    }
  }

  if (file === undefined) return "missing puzzle file";
  return { file, save, maxGenerations, trace };
}

function readText(io: CliIO, path: string): string | undefined {
  try {
    return io.readFile(path);
  } catch (err) {
    io.err(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}

function runSolve(args: readonly string[], io: CliIO): number {
  const parsed = parseSolveArgs(args);
  if (typeof parsed === "string") {
    io.err(parsed);
    io.err(USAGE);
    return EXIT_USAGE;
  }

  const config = loadConfig(io.env);
  const text = readText(io, parsed.file);
  if (text === undefined) return EXIT_USAGE;

  let puzzle: Puzzle;
  try {
    puzzle = parsePuzzle(text);
  } catch (err) {
    if (!isBoardError(err)) throw err;
    io.err(`error ${err.code}: ${err.message}`);
    return EXIT_USAGE;
  }

  const response = solvePuzzle(puzzle, {
    maxGenerations: parsed.maxGenerations ?? config.maxGenerations,
    observer: parsed.trace || config.trace ? createLogObserver(io.out) : undefined,
  });

  if (!response.ok) {
    io.err(`error ${response.error.code}: ${response.error.message}`);
    return EXIT_USAGE;
  }

  const { result } = response;
  switch (result.status) {
    case "solved": {
      io.out(`solved in ${result.path.length} moves: ${formatPath(result.path)}`);
      if (parsed.save) {
        const file = createSolutionFile(puzzle, result.path, io.now ? io.now() : new Date());
        io.writeFile(parsed.save, serializeSolution(file));
        io.out(`saved ${parsed.save}`);
      }
      return EXIT_OK;
    }
    case "unsolvable":
      io.out(`no solution (searched ${result.generations} generations)`);
      return EXIT_NO_SOLUTION;
    case "limitReached":
      io.out(`no solution within ${result.generations} generations`);
      return EXIT_NO_SOLUTION;
  }
}

function runVerify(args: readonly string[], io: CliIO): number {
  if (args.length !== 1) {
    io.err(USAGE);
    return EXIT_USAGE;
  }

  const text = readText(io, args[0]);
  if (text === undefined) return EXIT_USAGE;

  try {
    const file = deserializeSolution(text);
    const { wins, replay } = verifySolutionFile(file);
    const total = parsePath(file.moves).length;

    if (wins) {
      io.out(`ok: ${file.moves} brings every token to its exit`);
      return EXIT_OK;
    }
    io.out(`not a solution: ${replay.status} after ${replay.movesApplied} of ${total} moves`);
    return EXIT_NO_SOLUTION;
  } catch (err) {
    if (isBoardError(err)) {
      io.err(`error ${err.code}: ${err.message}`);
    } else if (err instanceof Error) {
      io.err(`error: ${err.message}`);
    } else {
      throw err;
    }
    return EXIT_USAGE;
  }
}

export function runCli(argv: readonly string[], io: CliIO): number {
  const [command, ...rest] = argv;

  switch (command) {
    case "solve":
      return runSolve(rest, io);
    case "verify":
      return runVerify(rest, io);
    case "help":
    case "--help":
      io.out(USAGE);
      return EXIT_OK;
    default:
      io.err(command ? `unknown command ${command}` : "missing command");
      io.err(USAGE);
      return EXIT_USAGE;
  }
}
