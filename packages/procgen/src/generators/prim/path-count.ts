/**
 * Valid-path counting
 *
 * Counts internally disjoint start→goal routes: find a route, wall off its
 * interior on a scratch copy, search again.
 */

import {
  type Path,
  type PathfinderAlgorithm,
  type Position,
} from "@labyrinth/contracts";
import {
  CellType,
  MazeGrid,
  type MutableMazeGrid,
  type ReadonlyMazeGrid,
} from "../../core/grid";
import { createPathfinder, GridSearchTarget } from "../../core/pathfinding";

export interface PathCount {
  /** Number of routes found, at most the requested limit */
  readonly count: number;
  /** The routes in the order they were found */
  readonly paths: readonly Path[];
  /** Scratch grid with the interior of every found route walled off */
  readonly blocked: MutableMazeGrid;
}

/**
 * Count structurally distinct routes between two cells, stopping at `limit`.
 *
 * The search stops early when no further route exists or when a route has no
 * interior cells (start and goal coincide or touch), since nothing could be
 * blocked to force another one. The input grid is left untouched.
 */
export function countValidPaths(
  grid: ReadonlyMazeGrid,
  start: Position,
  goal: Position,
  limit: number,
  algorithm: PathfinderAlgorithm = "bfs",
): PathCount {
  const blocked = grid.clone();
  const pathfinder = createPathfinder(algorithm, new GridSearchTarget(blocked));
  const paths: Path[] = [];

  while (paths.length < limit) {
    const path = pathfinder.findPath(start, goal);
    if (path === null) break;
    paths.push(path);

    const interior = path.slice(1, -1);
    if (interior.length === 0) break;
    for (const cell of interior) {
      blocked.setAt(cell, CellType.WALL);
    }
  }

  return { count: paths.length, paths, blocked };
}

/**
 * Most routes generation can promise between two cells, at most `limit`.
 *
 * Loop carving only ever opens walls, so the fully open grid is where it
 * ends at worst; the count this module reaches there is the ceiling.
 */
export function routeCeiling(
  rows: number,
  cols: number,
  start: Position,
  goal: Position,
  limit: number,
  algorithm: PathfinderAlgorithm = "bfs",
): number {
  const open = MazeGrid.passages(rows, cols);
  return countValidPaths(open, start, goal, limit, algorithm).count;
}
