import { describe, it, expect } from "vitest";
import {
  createLogObserver,
  initialTurn,
  search,
  solve,
  type GenerationInfo,
  type SearchResult,
} from "../src/engine";
import { board, puzzleOf, SINGLE } from "./helpers";

describe("search", () => {
  const single = puzzleOf(board(...SINGLE));
  const walledIn = puzzleOf(board("E..", "o..", "@.."));

  it("finds the first success in generation order", () => {
    expect(search(initialTurn(single))).toEqual({
      status: "solved",
      path: ["left", "left", "up", "up"],
      generations: 4,
    });
  });

  it("reports an exhausted frontier as unsolvable", () => {
    expect(search(initialTurn(walledIn))).toEqual({ status: "unsolvable", generations: 5 });
  });

  it("stops at the generation cap", () => {
    expect(search(initialTurn(single), { maxGenerations: 2 })).toEqual({
      status: "limitReached",
      generations: 2,
    });
  });

  it("treats a cap of 0 as unbounded", () => {
    expect(search(initialTurn(single), { maxGenerations: 0 }).status).toBe("solved");
  });

  it("still reports a success found exactly at the cap", () => {
    expect(search(initialTurn(single), { maxGenerations: 4 }).status).toBe("solved");
  });

  it("reports each generation to the observer", () => {
    const generations: GenerationInfo[] = [];
    const finished: SearchResult[] = [];

    search(initialTurn(single), {
      observer: {
        onGeneration: (info) => generations.push(info),
        onFinished: (result) => finished.push(result),
      },
    });

    expect(generations).toEqual([
      { generation: 1, frontierSize: 2, pruned: 2 },
      { generation: 2, frontierSize: 3, pruned: 5 },
      { generation: 3, frontierSize: 5, pruned: 7 },
      { generation: 4, frontierSize: 9, pruned: 11 },
    ]);
    expect(finished).toEqual([{ status: "solved", path: ["left", "left", "up", "up"], generations: 4 }]);
  });

  it("prunes down to an empty frontier", () => {
    const sizes: number[] = [];
    search(initialTurn(walledIn), { observer: { onGeneration: (info) => sizes.push(info.frontierSize) } });
    expect(sizes).toEqual([1, 2, 2, 2, 0]);
  });

  it("is deterministic", () => {
    const a = search(initialTurn(single));
    const b = search(initialTurn(single));
    expect(a).toEqual(b);
  });

  it("formats trace lines through the log observer", () => {
    const lines: string[] = [];
    search(initialTurn(single), { maxGenerations: 1, observer: createLogObserver((l) => lines.push(l)) });
    expect(lines).toEqual([
      "[search] generation=1 frontier=2 pruned=2",
      "[search] limitReached after 1 generations",
    ]);
  });
});

describe("solve", () => {
  it("returns the moves or null", () => {
    expect(solve(initialTurn(puzzleOf(board(...SINGLE))))).toEqual(["left", "left", "up", "up"]);
    expect(solve(initialTurn(puzzleOf(board("E..", "o..", "@.."))))).toBeNull();
  });
});
