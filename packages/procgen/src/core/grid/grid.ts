/**
 * Passability grid backing a maze.
 * Uses flat Uint8Array storage, row-major.
 */

import { MazeError, type Position } from "@labyrinth/contracts";
import {
  type CellNeighbour,
  type CellNeighbours,
  CellType,
  type MutableMazeGrid,
  type ReadonlyMazeGrid,
} from "./types";

function toCellType(value: number | undefined): CellType {
  return value === CellType.PASSAGE ? CellType.PASSAGE : CellType.WALL;
}

/**
 * rows×cols grid of wall/passage cells.
 *
 * @remarks
 * Dimensions are fixed at construction. Every read and write is bounds
 * checked and throws an `INDEX_OUT_OF_BOUNDS` MazeError outside the grid;
 * nothing is clamped.
 */
export class MazeGrid implements MutableMazeGrid {
  readonly rows: number;
  readonly cols: number;
  private readonly data: Uint8Array;

  constructor(rows: number, cols: number, initialValue: CellType = CellType.WALL) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw MazeError.configInvalid(`Invalid grid dimensions: ${rows}x${cols}`, {
        rows,
        cols,
      });
    }

    this.rows = rows;
    this.cols = cols;
    this.data = new Uint8Array(rows * cols);

    if (initialValue !== CellType.WALL) {
      this.data.fill(initialValue);
    }
  }

  /**
   * Create grid filled with walls
   */
  static walls(rows: number, cols: number): MazeGrid {
    return new MazeGrid(rows, cols, CellType.WALL);
  }

  /**
   * Create grid filled with passages
   */
  static passages(rows: number, cols: number): MazeGrid {
    return new MazeGrid(rows, cols, CellType.PASSAGE);
  }

  /**
   * Build a grid from nested rows of 0 (wall) and 1 (passage).
   *
   * @example
   * ```typescript
   * const grid = MazeGrid.fromRows([
   *   [1, 1, 0, 0],
   *   [0, 1, 0, 0],
   *   [0, 1, 1, 1],
   *   [0, 0, 0, 1],
   * ]);
   * ```
   */
  static fromRows(rows: readonly (readonly number[])[]): MazeGrid {
    const cols = rows[0]?.length ?? 0;
    const grid = new MazeGrid(rows.length, cols);

    rows.forEach((values, row) => {
      if (values.length !== cols) {
        throw MazeError.configInvalid(
          `Row ${row} has ${values.length} cells, expected ${cols}`,
          { row, length: values.length, cols },
        );
      }
      values.forEach((value, col) => {
        if (value !== CellType.WALL && value !== CellType.PASSAGE) {
          throw MazeError.configInvalid(
            `Cell (${row}, ${col}) must be 0 or 1, got ${value}`,
            { row, col, value },
          );
        }
        grid.data[row * cols + col] = value;
      });
    });

    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.rows &&
      col >= 0 &&
      col < this.cols
    );
  }

  contains(position: Position): boolean {
    return this.isInBounds(position[0], position[1]);
  }

  private indexOf(row: number, col: number): number {
    if (!this.isInBounds(row, col)) {
      throw MazeError.indexOutOfBounds(row, col, this.rows, this.cols);
    }
    return row * this.cols + col;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  get(row: number, col: number): CellType {
    return toCellType(this.data[this.indexOf(row, col)]);
  }

  getAt(position: Position): CellType {
    return this.get(position[0], position[1]);
  }

  set(row: number, col: number, value: CellType): void {
    this.data[this.indexOf(row, col)] = value;
  }

  setAt(position: Position, value: CellType): void {
    this.set(position[0], position[1], value);
  }

  isPassable(row: number, col: number): boolean {
    return this.get(row, col) === CellType.PASSAGE;
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * Neighbours of a cell in the order up, down, left, right.
   *
   * The cell itself must be inside the grid; out-of-bounds neighbours come
   * back as null.
   */
  getCellNeighbours(row: number, col: number): CellNeighbours {
    this.indexOf(row, col);
    return [
      this.neighbourAt(row - 1, col),
      this.neighbourAt(row + 1, col),
      this.neighbourAt(row, col - 1),
      this.neighbourAt(row, col + 1),
    ];
  }

  private neighbourAt(row: number, col: number): CellNeighbour {
    if (!this.isInBounds(row, col)) return null;
    return [row, col, toCellType(this.data[row * this.cols + col])];
  }

  /**
   * Count passable cells among the 4-connected neighbours.
   */
  countPassableNeighbours(row: number, col: number): number {
    let count = 0;
    for (const neighbour of this.getCellNeighbours(row, col)) {
      if (neighbour !== null && neighbour[2] === CellType.PASSAGE) count++;
    }
    return count;
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  clone(): MazeGrid {
    const result = new MazeGrid(this.rows, this.cols);
    result.data.set(this.data);
    return result;
  }

  equals(other: ReadonlyMazeGrid): boolean {
    if (this.rows !== other.rows || this.cols !== other.cols) {
      return false;
    }
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        if (this.get(row, col) !== other.get(row, col)) return false;
      }
    }
    return true;
  }

  /**
   * Copy the cells out as nested rows.
   */
  toRows(): CellType[][] {
    const rows: CellType[][] = [];
    for (let row = 0; row < this.rows; row++) {
      const values: CellType[] = [];
      for (let col = 0; col < this.cols; col++) {
        values.push(toCellType(this.data[row * this.cols + col]));
      }
      rows.push(values);
    }
    return rows;
  }

  countCells(cellType: CellType): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] === cellType) count++;
    }
    return count;
  }

  forEach(callback: (row: number, col: number, value: CellType) => void): void {
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        callback(row, col, toCellType(this.data[row * this.cols + col]));
      }
    }
  }
}
