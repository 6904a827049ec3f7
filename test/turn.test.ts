import { describe, it, expect } from "vitest";
import { expandTurn, hasVisited, historyOf, initialTurn } from "../src/engine";
import { board, pos, puzzleOf } from "./helpers";

describe("Turn", () => {
  const single = puzzleOf(board("#E#", "...", ".@.", ".o."));

  it("starts ongoing with an empty history and the start already visited", () => {
    const t = initialTurn(single);
    expect(t.status).toBe("ongoing");
    expect(t.positions).toEqual([pos(1, 1)]);
    expect(historyOf(t)).toEqual([]);
    expect(hasVisited(t, [pos(1, 1)])).toBe(true);
    expect(hasVisited(t, [pos(1, 0)])).toBe(false);
  });

  it("moves the token and records the move", () => {
    const child = expandTurn(initialTurn(single), "up");
    expect(child.status).toBe("ongoing");
    expect(child.positions).toEqual([pos(1, 0)]);
    expect(historyOf(child)).toEqual(["up"]);
    expect(hasVisited(child, [pos(1, 0)])).toBe(true);
    expect(hasVisited(child, [pos(1, 1)])).toBe(true);
  });

  it("leaves the parent untouched and keeps siblings apart", () => {
    const parent = initialTurn(single);
    const left = expandTurn(parent, "left");
    const right = expandTurn(parent, "right");

    expect(historyOf(parent)).toEqual([]);
    expect(hasVisited(parent, left.positions)).toBe(false);
    expect(hasVisited(left, right.positions)).toBe(false);
    expect(hasVisited(right, left.positions)).toBe(false);
    expect(historyOf(left)).toEqual(["left"]);
    expect(historyOf(right)).toEqual(["right"]);
  });

  it("succeeds when the token exits", () => {
    const t = expandTurn(expandTurn(initialTurn(single), "up"), "up");
    expect(t.status).toBe("succeeded");
    expect(historyOf(t)).toEqual(["up", "up"]);
  });

  it("fails when the token falls into a pit", () => {
    const t = expandTurn(initialTurn(single), "down");
    expect(t.status).toBe("failed");
    expect(historyOf(t)).toEqual(["down"]);
  });

  it("fails when a wall bump leaves the joint position unchanged", () => {
    const t = expandTurn(expandTurn(initialTurn(single), "left"), "left");
    expect(t.status).toBe("failed");
  });

  it("fails when a lineage returns to a position it has seen", () => {
    const there = expandTurn(initialTurn(single), "right");
    expect(there.status).toBe("ongoing");
    const back = expandTurn(there, "left");
    expect(back.status).toBe("failed");
  });

  it("refuses to expand a finished turn", () => {
    const dead = expandTurn(initialTurn(single), "down");
    expect(() => expandTurn(dead, "up")).toThrow(/cannot expand a failed turn/);
  });

  it("rejects a puzzle whose boards and starts do not line up", () => {
    expect(() => initialTurn({ boards: single.boards, starts: [] })).toThrow(/1 boards but 0 start positions/);
    expect(() => initialTurn({ boards: [], starts: [] })).toThrow(/no boards/);
  });

  describe("two tokens", () => {
    // A exits one move before B
    const lockstep = puzzleOf(board("E..", "@..", "..."), board("E..", "...", "@.."));

    it("keeps going while one token bumps a wall and the other moves", () => {
      const t = expandTurn(initialTurn(lockstep), "down");
      expect(t.status).toBe("ongoing");
      expect(t.positions).toEqual([pos(0, 1), pos(0, 1)]);
    });

    it("fails when only one token exits", () => {
      const t = expandTurn(initialTurn(lockstep), "up");
      expect(t.status).toBe("failed");
    });

    it("succeeds only when both tokens exit on the same move", () => {
      let t = initialTurn(lockstep);
      t = expandTurn(t, "down");
      t = expandTurn(t, "up");
      expect(t.status).toBe("ongoing");
      expect(t.positions).toEqual([pos(0, 0), pos(0, 0)]);
      t = expandTurn(t, "up");
      expect(t.status).toBe("succeeded");
    });
  });
});
