/**
 * A cell coordinate as `[row, col]`.
 *
 * Valid when `0 <= row < rows` and `0 <= col < cols` for the grid it indexes.
 */
export type Position = readonly [row: number, col: number];

/**
 * An ordered route of positions, start first and goal last.
 */
export type Path = readonly Position[];

/**
 * Smallest maze edge length accepted by the maze aggregate.
 */
export const MIN_MAZE_SIZE = 4;

/**
 * Names of the available search strategies.
 */
export const PATHFINDER_ALGORITHMS = ["bfs"] as const;

/**
 * Search strategy identifiers.
 */
export const PathfinderAlgorithm = {
  BFS: "bfs",
} as const satisfies Record<string, (typeof PATHFINDER_ALGORITHMS)[number]>;

export type PathfinderAlgorithm =
  (typeof PathfinderAlgorithm)[keyof typeof PathfinderAlgorithm];

/**
 * Format a position the way logs and summaries print it.
 */
export function formatPosition(position: Position): string {
  return `(${position[0]}, ${position[1]})`;
}

/**
 * Check two positions for equality.
 */
export function positionsEqual(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}
