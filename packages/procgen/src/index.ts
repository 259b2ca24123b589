/**
 * Maze generation package
 *
 * Seeded grid mazes with a guaranteed number of distinct start→goal routes,
 * breadth-first solving and HTML/ASCII export.
 *
 * @example
 * ```typescript
 * import { createMaze, renderMazeHTML } from "@labyrinth/procgen";
 *
 * const result = createMaze({ size: 20, seed: 12345, start: [1, 1] });
 *
 * if (result.success) {
 *   const maze = result.value;
 *   console.log(`Shortest route: ${maze.findPath()?.length} cells`);
 *   writeFileSync("maze.html", renderMazeHTML(maze, { drawSolution: true }));
 * }
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Utilities
export * from "./utils";

// Command line
export {
  type CliOptions,
  defaultOutputPath,
  HELP_TEXT,
  parseCliArgs,
} from "./cli/options";
// High-level API
export { createMaze } from "./api";
export { MAZE_DEFAULTS, type MazeDefaults } from "./config";
export { Maze, type MazeOptions } from "./maze";
