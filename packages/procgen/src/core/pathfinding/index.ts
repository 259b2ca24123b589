/**
 * Pathfinding Module
 *
 * Search strategies and the registry that maps algorithm names to them.
 * Adding a strategy means adding a registry entry; callers keep asking for
 * it by name.
 */

import {
  MazeError,
  PATHFINDER_ALGORITHMS,
  type PathfinderAlgorithm,
} from "@labyrinth/contracts";
import { BFS } from "./bfs";
import type { Pathfinder, PathfindingTarget } from "./types";

export { PathfinderBase } from "./base";
export { BFS } from "./bfs";
export { GridSearchTarget } from "./target";
export type { Pathfinder, PathfindingTarget } from "./types";

/**
 * Pathfinder registry
 */
const pathfinders: Record<
  PathfinderAlgorithm,
  (maze: PathfindingTarget) => Pathfinder
> = {
  bfs: (maze) => new BFS(maze),
};

export function isPathfinderAlgorithm(
  value: string,
): value is PathfinderAlgorithm {
  return PATHFINDER_ALGORITHMS.some((name) => name === value);
}

/**
 * Create the named search strategy bound to `maze`.
 *
 * @throws {MazeError} `ALGORITHM_NOT_FOUND` for names outside the registry
 */
export function createPathfinder(
  algorithm: string,
  maze: PathfindingTarget,
): Pathfinder {
  if (!isPathfinderAlgorithm(algorithm)) {
    throw MazeError.algorithmNotFound(algorithm);
  }
  return pathfinders[algorithm](maze);
}
