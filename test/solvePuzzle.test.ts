import { describe, it, expect } from "vitest";
import { solvePuzzle } from "../src/engine";
import { board, pos, puzzleOf, SINGLE } from "./helpers";

describe("solvePuzzle", () => {
  it("solves puzzle text", () => {
    expect(solvePuzzle(SINGLE.join("\n"))).toEqual({
      ok: true,
      result: { status: "solved", path: ["left", "left", "up", "up"], generations: 4 },
    });
  });

  it("solves one text per board", () => {
    const response = solvePuzzle(["E..\n@..\n...", "E..\n...\n@.."]);
    expect(response).toEqual({
      ok: true,
      result: { status: "solved", path: ["down", "up", "up"], generations: 3 },
    });
  });

  it("solves an already parsed puzzle", () => {
    const response = solvePuzzle(puzzleOf(board(...SINGLE)));
    expect(response.ok && response.result.status).toBe("solved");
  });

  it("reports no solution as a normal result", () => {
    expect(solvePuzzle("E..\no..\n@..")).toEqual({
      ok: true,
      result: { status: "unsolvable", generations: 5 },
    });
  });

  it("passes search options through", () => {
    expect(solvePuzzle(SINGLE.join("\n"), { maxGenerations: 1 })).toEqual({
      ok: true,
      result: { status: "limitReached", generations: 1 },
    });
  });

  it("reports malformed input as an error envelope", () => {
    const response = solvePuzzle("....\n.@..");
    expect(response).toEqual({
      ok: false,
      error: {
        code: "MISSING_EXIT",
        message: `board 0: First line has no exit marker 'E': "...."`,
        location: { row: -1, board: 0 },
      },
    });
  });

  it("keeps error kinds distinct", () => {
    const codes = ["", "E..\n...", "E..\n.?@", "E..\nT@.", "E\n@\n\nE\n@\n\nE\n@"].map((text) => {
      const r = solvePuzzle(text);
      return r.ok ? "ok" : r.error.code;
    });
    expect(codes).toEqual(["EMPTY_INPUT", "MISSING_START", "UNKNOWN_TILE", "MISSING_TELEPORTER", "TOO_MANY_BOARDS"]);
  });

  it("gives the same answer on every run", () => {
    const text = "E..\n@..\n...\n\nE..\n...\n@..";
    expect(solvePuzzle(text)).toEqual(solvePuzzle(text));
  });

  it("lets programming errors through", () => {
    expect(() => solvePuzzle({ boards: puzzleOf(board(...SINGLE)).boards, starts: [] })).toThrow(/initialTurn/);
  });
});

describe("solvePuzzle with a prebuilt puzzle", () => {
  const single = board(...SINGLE);

  it("rejects a start on a pit", () => {
    expect(solvePuzzle({ boards: [single.board], starts: [pos(3, 1)] })).toEqual({
      ok: false,
      error: {
        code: "INVALID_START",
        message: "board 0: Start (3,1) is on a pit tile.",
        location: { board: 0, row: 1, col: 3 },
      },
    });
  });

  it("rejects a start outside the grid", () => {
    const response = solvePuzzle({ boards: [single.board, single.board], starts: [single.start, pos(9, 0)] });
    expect(response).toEqual({
      ok: false,
      error: {
        code: "INVALID_START",
        message: "board 1: Start (9,0) is outside the grid.",
        location: { board: 1, row: 0, col: 9 },
      },
    });
  });

  it("accepts a start on ice", () => {
    const response = solvePuzzle({ boards: [single.board], starts: [pos(1, 1)] });
    expect(response.ok).toBe(true);
  });
});
