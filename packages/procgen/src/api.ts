/**
 * Generation API
 *
 * High-level API for maze generation.
 */

import { buildMazeConfig, MazeError, Result } from "@labyrinth/contracts";
import { Maze } from "./maze";

/**
 * Validate a config, build the maze and generate it.
 *
 * Unlike `new Maze()`, start and goal are checked against the maze bounds
 * before anything is built.
 *
 * @example
 * ```typescript
 * const result = createMaze({ size: 20, seed: 7, start: [1, 1] });
 * if (result.success) {
 *   console.log(result.value.findPath()?.length);
 * }
 * ```
 */
export function createMaze(config: unknown): Result<Maze, MazeError> {
  return buildMazeConfig(config).flatMap(
    ({ size, seed, start, goal, minValidPaths, algorithm }) =>
      Result.fromThrowable(
        () => {
          const maze = new Maze({
            size,
            seed,
            start,
            goal,
            minValidPaths,
            pathfindingAlgorithm: algorithm,
          });
          maze.generateMaze();
          return maze;
        },
        (e) =>
          MazeError.isMazeError(e)
            ? e
            : MazeError.generationFailed(
                e instanceof Error ? e.message : String(e),
              ),
      ),
  );
}
