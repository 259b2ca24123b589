/**
 * Maze aggregate
 *
 * Binds the grid, endpoints, seed, route constraint and search strategy of
 * one maze instance.
 */

import {
  formatPosition,
  MazeError,
  MIN_MAZE_SIZE,
  type Path,
  type PathfinderAlgorithm,
  type Position,
} from "@labyrinth/contracts";
import { MAZE_DEFAULTS } from "./config";
import {
  type CellNeighbours,
  MazeGrid,
  type MutableMazeGrid,
  type ReadonlyMazeGrid,
} from "./core/grid";
import { createPathfinder, type PathfindingTarget } from "./core/pathfinding";
import { type GenerationReport, generatePrimMaze } from "./generators";

export interface MazeOptions {
  readonly seed: number;
  /** Edge length; the maze is size × size */
  readonly size: number;
  readonly start: Position;
  readonly goal: Position;
  /** Distinct start→goal routes generation must produce (default: 3) */
  readonly minValidPaths?: number;
  /** Search strategy for path queries and generation (default: "bfs") */
  readonly pathfindingAlgorithm?: PathfinderAlgorithm;
  /** Loop carves allowed per generation (default: size²) */
  readonly maxLoopCarves?: number;
}

/**
 * A square maze.
 *
 * @remarks
 * `start` and `goal` are not bounds checked here: the first grid access at
 * an invalid coordinate (generation or a path query) throws an
 * `INDEX_OUT_OF_BOUNDS` MazeError. Use `buildMazeConfig` or `createMaze` to
 * reject them up front.
 *
 * @example
 * ```typescript
 * const maze = new Maze({ seed: 42, size: 10, start: [1, 1], goal: [8, 8] });
 * maze.generateMaze();
 * const path = maze.findPath(); // also cached on maze.path
 * ```
 */
export class Maze implements PathfindingTarget {
  readonly rows: number;
  readonly cols: number;
  readonly seed: number;
  readonly start: Position;
  readonly goal: Position;
  readonly minValidPaths: number;
  readonly maxLoopCarves: number | undefined;
  pathfindingAlgorithm: PathfinderAlgorithm;
  /** Result of the last successful path query, cleared when it goes stale */
  path: Path | null = null;
  lastGeneration: GenerationReport | null = null;
  private currentGrid: MutableMazeGrid;

  constructor(options: MazeOptions) {
    const { size, seed } = options;
    if (!Number.isInteger(size)) {
      throw MazeError.configInvalid(`size must be an integer, got ${size}`, { size });
    }
    if (size < MIN_MAZE_SIZE) {
      throw MazeError.sizeTooSmall(size, MIN_MAZE_SIZE);
    }
    if (!Number.isInteger(seed)) {
      throw MazeError.configInvalid(`seed must be an integer, got ${seed}`, { seed });
    }

    const minValidPaths = options.minValidPaths ?? MAZE_DEFAULTS.MIN_VALID_PATHS;
    if (!Number.isInteger(minValidPaths) || minValidPaths < 1) {
      throw MazeError.configInvalid(
        `minValidPaths must be an integer of at least 1, got ${minValidPaths}`,
        { minValidPaths },
      );
    }

    this.rows = size;
    this.cols = size;
    this.seed = seed;
    this.start = [options.start[0], options.start[1]];
    this.goal = [options.goal[0], options.goal[1]];
    this.minValidPaths = minValidPaths;
    this.maxLoopCarves = options.maxLoopCarves;
    this.pathfindingAlgorithm =
      options.pathfindingAlgorithm ?? MAZE_DEFAULTS.ALGORITHM;
    this.currentGrid = MazeGrid.walls(size, size);
  }

  get grid(): ReadonlyMazeGrid {
    return this.currentGrid;
  }

  /**
   * Replace the whole grid, e.g. to stage a layout. The maze keeps its own
   * copy, so later edits to `grid` do not reach it. Dimensions must match;
   * the cached path is cleared.
   */
  set grid(grid: ReadonlyMazeGrid) {
    if (grid.rows !== this.rows || grid.cols !== this.cols) {
      throw MazeError.configInvalid(
        `Grid is ${grid.rows}x${grid.cols}, maze is ${this.rows}x${this.cols}`,
        { rows: grid.rows, cols: grid.cols },
      );
    }
    this.currentGrid = grid.clone();
    this.path = null;
  }

  /**
   * Carve a new grid for this maze's seed and constraints.
   *
   * The grid is only replaced when generation succeeds; on failure the
   * previous grid, path and report stay as they were.
   */
  generateMaze(
    algorithm: PathfinderAlgorithm = this.pathfindingAlgorithm,
  ): GenerationReport {
    const { grid, report } = generatePrimMaze({
      rows: this.rows,
      cols: this.cols,
      seed: this.seed,
      start: this.start,
      goal: this.goal,
      minValidPaths: this.minValidPaths,
      algorithm,
      maxLoopCarves: this.maxLoopCarves,
    });

    this.pathfindingAlgorithm = algorithm;
    this.currentGrid = grid;
    this.path = null;
    this.lastGeneration = report;
    return report;
  }

  /**
   * Search start→goal with the configured strategy.
   *
   * Clears `path` first, so after a failed search it is null rather than a
   * route for an older grid.
   */
  findPath(): Path | null {
    this.path = null;
    return createPathfinder(this.pathfindingAlgorithm, this).findPath(
      this.start,
      this.goal,
    );
  }

  getCellNeighbours(row: number, col: number): CellNeighbours {
    return this.currentGrid.getCellNeighbours(row, col);
  }

  toString(): string {
    return `Maze(rows=${this.rows}, cols=${this.cols}, start=${formatPosition(this.start)}, goal=${formatPosition(this.goal)})`;
  }
}
