import { MIN_MAZE_SIZE, PathfinderAlgorithm } from "@labyrinth/contracts";

export const MAZE_DEFAULTS = {
  SIZE: 40,
  SEED: 42,
  START: [1, 1],
  MIN_VALID_PATHS: 3,
  MIN_SIZE: MIN_MAZE_SIZE,
  ALGORITHM: PathfinderAlgorithm.BFS,
  OUTPUT_DIR: process.env.MAZE_OUTPUT_DIR ?? ".",
} as const;

export type MazeDefaults = typeof MAZE_DEFAULTS;
