/**
 * Shared 4x4 layouts for grid and search tests.
 */

import { MazeGrid } from "../src/core/grid";

/** Two routes' worth of passages around a walled interior, goal at (3, 3) */
export const OPEN_CORNER_ROWS = [
  [1, 1, 1, 1],
  [0, 0, 1, 1],
  [1, 1, 1, 0],
  [1, 0, 1, 1],
] as const;

/** A single winding corridor from (0, 0) to (3, 3) */
export const CORRIDOR_ROWS = [
  [1, 1, 0, 0],
  [0, 1, 0, 0],
  [0, 1, 1, 1],
  [0, 0, 0, 1],
] as const;

export function openCornerGrid(): MazeGrid {
  return MazeGrid.fromRows(OPEN_CORNER_ROWS);
}

export function corridorGrid(): MazeGrid {
  return MazeGrid.fromRows(CORRIDOR_ROWS);
}

/**
 * Run `fn` and return what it throws.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}
