import type { SolutionFile } from "./replayFormat";
import { SOLUTION_FORMAT_VERSION } from "./replayFormat";

function isIsoDateString(s: unknown): s is string {
  if (typeof s !== "string") return false;
  const t = Date.parse(s);
  return Number.isFinite(t) && new Date(t).toISOString() === s;
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

export function validateSolutionFile(file: unknown): asserts file is SolutionFile {
  if (!isObject(file)) {
    throw new Error("Invalid solution file: not an object");
  }

  if (file["formatVersion"] !== SOLUTION_FORMAT_VERSION) {
    throw new Error(`Invalid solution formatVersion: ${String(file["formatVersion"])}`);
  }

  if (!isIsoDateString(file["createdAt"])) {
    throw new Error(`Invalid solution createdAt: ${String(file["createdAt"])}`);
  }

  const boards = file["boards"];
  if (!Array.isArray(boards) || boards.length === 0) {
    throw new Error("Invalid solution boards");
  }
  for (let i = 0; i < boards.length; i++) {
    if (typeof boards[i] !== "string") {
      throw new Error(`Invalid solution boards[${i}]`);
    }
  }

  if (typeof file["moves"] !== "string") {
    throw new Error("Invalid solution moves");
  }
}
