/**
 * Flood fill over passable cells.
 */

import type { Position } from "@labyrinth/contracts";
import { CoordSet, FastQueue } from "../data-structures/fast-queue";
import { CellType, type ReadonlyMazeGrid } from "./types";

/**
 * Collect every passable cell 4-connected to `origin`.
 *
 * Returns an empty set when the origin itself is a wall. The origin must be
 * inside the grid.
 */
export function floodReachable(
  grid: ReadonlyMazeGrid,
  origin: Position,
): CoordSet {
  const reached = new CoordSet(grid.rows, grid.cols);
  if (grid.getAt(origin) !== CellType.PASSAGE) return reached;

  const queue = FastQueue.from<Position>([origin]);
  reached.add(origin[0], origin[1]);

  for (let cell = queue.dequeue(); cell !== undefined; cell = queue.dequeue()) {
    for (const neighbour of grid.getCellNeighbours(cell[0], cell[1])) {
      if (neighbour === null) continue;
      const [row, col, value] = neighbour;
      if (value !== CellType.PASSAGE || reached.has(row, col)) continue;
      reached.add(row, col);
      queue.enqueue([row, col]);
    }
  }

  return reached;
}
