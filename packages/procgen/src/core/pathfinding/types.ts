/**
 * Search strategy contracts.
 */

import type { Path, Position } from "@labyrinth/contracts";
import type { CellNeighbours, ReadonlyMazeGrid } from "../grid/types";

/**
 * What a search strategy needs from the maze it is bound to.
 *
 * `path` is shared state: a successful search writes its result there.
 */
export interface PathfindingTarget {
  readonly rows: number;
  readonly cols: number;
  readonly grid: ReadonlyMazeGrid;
  path: Path | null;
  getCellNeighbours(row: number, col: number): CellNeighbours;
}

/**
 * A path-finding algorithm bound to one target.
 *
 * Implementations never mutate the grid. They return null when the goal is
 * unreachable; on success they store the path on `maze.path` and return
 * that same array.
 */
export interface Pathfinder {
  readonly maze: PathfindingTarget;
  findPath(start: Position, goal: Position): Path | null;
}
