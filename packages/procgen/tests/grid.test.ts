/**
 * MazeGrid unit tests
 */

import { describe, expect, it } from "vitest";
import { CellType, MazeGrid } from "../src/core/grid";
import { corridorGrid, openCornerGrid, thrownBy } from "./fixtures";

describe("MazeGrid", () => {
  describe("construction", () => {
    it("creates grid with correct dimensions", () => {
      const grid = new MazeGrid(6, 9);
      expect(grid.rows).toBe(6);
      expect(grid.cols).toBe(9);
    });

    it("initializes with walls by default", () => {
      const grid = new MazeGrid(4, 4);
      expect(grid.countCells(CellType.WALL)).toBe(16);
      expect(grid.countCells(CellType.PASSAGE)).toBe(0);
    });

    it("initializes with custom fill value", () => {
      const grid = MazeGrid.passages(3, 5);
      expect(grid.get(2, 4)).toBe(CellType.PASSAGE);
      expect(grid.countCells(CellType.PASSAGE)).toBe(15);
    });

    it("rejects non-positive or fractional dimensions", () => {
      expect(() => new MazeGrid(0, 4)).toThrow("Invalid grid dimensions: 0x4");
      expect(() => new MazeGrid(4, 2.5)).toThrow("Invalid grid dimensions: 4x2.5");
    });

    it("builds from nested rows", () => {
      const grid = corridorGrid();
      expect(grid.rows).toBe(4);
      expect(grid.cols).toBe(4);
      expect(grid.toRows()).toEqual([
        [1, 1, 0, 0],
        [0, 1, 0, 0],
        [0, 1, 1, 1],
        [0, 0, 0, 1],
      ]);
    });

    it("rejects ragged rows and values other than 0 and 1", () => {
      expect(() => MazeGrid.fromRows([[1, 1], [1]])).toThrow(
        "Row 1 has 1 cells, expected 2",
      );
      expect(() => MazeGrid.fromRows([[1, 2]])).toThrow(
        "Cell (0, 1) must be 0 or 1, got 2",
      );
    });
  });

  describe("get/set operations", () => {
    it("sets and gets values correctly", () => {
      const grid = MazeGrid.walls(4, 4);
      grid.set(2, 3, CellType.PASSAGE);
      expect(grid.get(2, 3)).toBe(CellType.PASSAGE);
      expect(grid.getAt([2, 3])).toBe(CellType.PASSAGE);
      expect(grid.isPassable(2, 3)).toBe(true);
      expect(grid.isPassable(3, 2)).toBe(false);
    });

    it("addresses cells by row then column", () => {
      const grid = MazeGrid.walls(4, 6);
      grid.setAt([1, 5], CellType.PASSAGE);
      expect(grid.toRows()[1]).toEqual([0, 0, 0, 0, 0, 1]);
    });

    it("throws INDEX_OUT_OF_BOUNDS outside the grid", () => {
      const grid = MazeGrid.walls(4, 4);
      expect(() => grid.get(4, 0)).toThrow("Cell (4, 0) is outside a 4x4 grid");
      expect(() => grid.get(0, -1)).toThrow("Cell (0, -1) is outside a 4x4 grid");
      expect(thrownBy(() => grid.set(-1, 2, CellType.PASSAGE))).toMatchObject({
        code: "INDEX_OUT_OF_BOUNDS",
        details: { row: -1, col: 2, rows: 4, cols: 4 },
      });
    });

    it("reports bounds membership", () => {
      const grid = MazeGrid.walls(4, 5);
      expect(grid.isInBounds(3, 4)).toBe(true);
      expect(grid.isInBounds(4, 4)).toBe(false);
      expect(grid.isInBounds(1.5, 1)).toBe(false);
      expect(grid.contains([0, 0])).toBe(true);
      expect(grid.contains([0, 5])).toBe(false);
    });
  });

  describe("getCellNeighbours", () => {
    it("returns up, down, left and right for an inner cell", () => {
      expect(openCornerGrid().getCellNeighbours(2, 2)).toEqual([
        [1, 2, 1],
        [3, 2, 1],
        [2, 1, 1],
        [2, 3, 0],
      ]);
    });

    it("returns the same layout for a corridor cell", () => {
      expect(corridorGrid().getCellNeighbours(1, 1)).toEqual([
        [0, 1, 1],
        [2, 1, 1],
        [1, 0, 0],
        [1, 2, 0],
      ]);
    });

    it("uses null for neighbours past the edge", () => {
      expect(openCornerGrid().getCellNeighbours(0, 0)).toEqual([
        null,
        [1, 0, 0],
        null,
        [0, 1, 1],
      ]);
      expect(corridorGrid().getCellNeighbours(3, 3)).toEqual([
        [2, 3, 1],
        null,
        [3, 2, 0],
        null,
      ]);
    });

    it("throws for a cell outside the grid", () => {
      expect(thrownBy(() => openCornerGrid().getCellNeighbours(4, 4))).toMatchObject({
        code: "INDEX_OUT_OF_BOUNDS",
      });
    });

    it("counts passable neighbours", () => {
      const grid = openCornerGrid();
      expect(grid.countPassableNeighbours(2, 2)).toBe(3);
      expect(grid.countPassableNeighbours(0, 0)).toBe(1);
      expect(grid.countPassableNeighbours(1, 0)).toBe(2);
    });
  });

  describe("utility", () => {
    it("clones independently", () => {
      const grid = corridorGrid();
      const copy = grid.clone();
      expect(copy.equals(grid)).toBe(true);

      copy.set(0, 0, CellType.WALL);
      expect(grid.get(0, 0)).toBe(CellType.PASSAGE);
      expect(copy.equals(grid)).toBe(false);
    });

    it("compares dimensions in equals", () => {
      expect(MazeGrid.walls(4, 4).equals(MazeGrid.walls(4, 5))).toBe(false);
    });

    it("visits every cell in row-major order", () => {
      const visited: string[] = [];
      MazeGrid.fromRows([
        [1, 0],
        [0, 1],
      ]).forEach((row, col, value) => visited.push(`${row}${col}:${value}`));
      expect(visited).toEqual(["00:1", "01:0", "10:0", "11:1"]);
    });
  });
});
