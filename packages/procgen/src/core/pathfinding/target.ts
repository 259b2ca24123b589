import type { Path } from "@labyrinth/contracts";
import type { CellNeighbours, ReadonlyMazeGrid } from "../grid/types";
import type { PathfindingTarget } from "./types";

/**
 * Search target over a bare grid, for searches that should not touch a
 * maze's cached path (the generator's scratch copies, for one).
 */
export class GridSearchTarget implements PathfindingTarget {
  path: Path | null = null;

  constructor(readonly grid: ReadonlyMazeGrid) {}

  get rows(): number {
    return this.grid.rows;
  }

  get cols(): number {
    return this.grid.cols;
  }

  getCellNeighbours(row: number, col: number): CellNeighbours {
    return this.grid.getCellNeighbours(row, col);
  }
}
