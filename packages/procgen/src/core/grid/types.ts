/**
 * Grid types for maze generation.
 */

import type { Position } from "@labyrinth/contracts";

/**
 * Cell passability flags
 */
export const CellType = {
  WALL: 0,
  PASSAGE: 1,
} as const;

export type CellType = (typeof CellType)[keyof typeof CellType];

/**
 * An in-bounds neighbour as `[row, col, cell]`, or null past the grid edge.
 */
export type CellNeighbour = readonly [row: number, col: number, cell: CellType] | null;

/**
 * Neighbours in the fixed order up, down, left, right.
 */
export type CellNeighbours = readonly [
  up: CellNeighbour,
  down: CellNeighbour,
  left: CellNeighbour,
  right: CellNeighbour,
];

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface.
 *
 * Search strategies only ever receive this view, so they cannot carve or
 * block cells of the maze they explore.
 */
export interface ReadonlyMazeGrid {
  readonly rows: number;
  readonly cols: number;

  isInBounds(row: number, col: number): boolean;
  contains(position: Position): boolean;

  get(row: number, col: number): CellType;
  getAt(position: Position): CellType;
  isPassable(row: number, col: number): boolean;
  getCellNeighbours(row: number, col: number): CellNeighbours;
  countPassableNeighbours(row: number, col: number): number;

  clone(): MutableMazeGrid;
  equals(other: ReadonlyMazeGrid): boolean;
  toRows(): CellType[][];
  countCells(cellType: CellType): number;
  forEach(callback: (row: number, col: number, value: CellType) => void): void;
}

/**
 * Mutable grid interface.
 *
 * Extends ReadonlyMazeGrid with the carving operations used by generators
 * and by the path counter's scratch copies.
 */
export interface MutableMazeGrid extends ReadonlyMazeGrid {
  set(row: number, col: number, value: CellType): void;
  setAt(position: Position, value: CellType): void;
}
