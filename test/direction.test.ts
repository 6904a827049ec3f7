import { describe, it, expect } from "vitest";
import { DIRECTIONS, directionDelta, makePosition, stepPosition } from "../src/engine";
import { pos } from "./helpers";

describe("directions", () => {
  it("enumerates up, down, right, left", () => {
    expect(DIRECTIONS).toEqual(["up", "down", "right", "left"]);
  });

  it("maps each direction to a unit delta with y growing downward", () => {
    expect(DIRECTIONS.map(directionDelta)).toEqual([pos(0, -1), pos(0, 1), pos(1, 0), pos(-1, 0)]);
  });

  it("steps one cell, including off the grid", () => {
    expect(stepPosition(makePosition(2, 0), "up")).toEqual(pos(2, -1));
    expect(stepPosition(makePosition(0, 3), "left")).toEqual(pos(-1, 3));
  });

  it("builds plain value positions", () => {
    expect(makePosition(4, 7)).toEqual({ x: 4, y: 7 });
  });
});
