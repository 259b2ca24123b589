/**
 * Flood fill unit tests
 */

import { describe, expect, it } from "vitest";
import { CellType, floodReachable, MazeGrid } from "../src/core/grid";
import { openCornerGrid } from "./fixtures";

describe("floodReachable", () => {
  it("collects every connected passage", () => {
    const reached = floodReachable(openCornerGrid(), [0, 0]);
    expect(reached.size).toBe(12);
    expect(reached.has(3, 0)).toBe(true);
    expect(reached.has(1, 0)).toBe(false);
  });

  it("respects walls", () => {
    const grid = MazeGrid.passages(4, 4);
    for (let row = 0; row < 4; row++) {
      grid.set(row, 2, CellType.WALL);
    }

    const reached = floodReachable(grid, [0, 0]);

    expect(reached.size).toBe(8);
    expect(reached.has(0, 3)).toBe(false);
  });

  it("returns empty when the origin is a wall", () => {
    expect(floodReachable(openCornerGrid(), [1, 0]).size).toBe(0);
  });
});
