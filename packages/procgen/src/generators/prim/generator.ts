/**
 * Prim Maze Generator
 *
 * Seeded spanning-tree carving followed by loop carving until the requested
 * number of distinct start→goal routes exists.
 */

import {
  MazeError,
  type PathfinderAlgorithm,
  type Position,
  SeededRandom,
} from "@labyrinth/contracts";
import { CellType, MazeGrid } from "../../core/grid";
import { LOOP_CARVES_PER_CELL } from "./constants";
import { carveSpanningTree, pickLoopWall } from "./passes";
import { countValidPaths, routeCeiling } from "./path-count";

export interface PrimMazeRequest {
  readonly rows: number;
  readonly cols: number;
  readonly seed: number;
  readonly start: Position;
  readonly goal: Position;
  readonly minValidPaths: number;
  readonly algorithm: PathfinderAlgorithm;
  /** Loop carves allowed before giving up (default: rows × cols) */
  readonly maxLoopCarves?: number;
}

export interface GenerationReport {
  /** Cells opened by the spanning tree, start and a detached goal included */
  readonly carvedCells: number;
  /** Walls opened afterwards to connect the goal or add routes */
  readonly loopCarves: number;
  /** Distinct routes counted on the final grid, capped at the target */
  readonly validPaths: number;
  /** Routes the generator aimed for */
  readonly targetPaths: number;
  /** Routes the caller asked for */
  readonly requestedPaths: number;
  /** True when the endpoints could not support the requested count */
  readonly clamped: boolean;
}

export interface PrimMazeResult {
  readonly grid: MazeGrid;
  readonly report: GenerationReport;
}

/**
 * Generate a maze grid.
 *
 * The same request always yields the same grid: the PRNG seeded from
 * `request.seed` is the only source of randomness.
 *
 * @throws {MazeError} `INDEX_OUT_OF_BOUNDS` when start or goal lie outside
 * the grid, `GENERATION_FAILED` when the route target is still unmet after
 * the loop-carving budget or once no wall is left to open
 */
export function generatePrimMaze(request: PrimMazeRequest): PrimMazeResult {
  const { rows, cols, start, goal, algorithm } = request;
  const grid = MazeGrid.walls(rows, cols);
  const rng = new SeededRandom(request.seed);

  let carvedCells = carveSpanningTree(grid, start, rng);
  if (grid.getAt(goal) === CellType.WALL) {
    grid.setAt(goal, CellType.PASSAGE);
    carvedCells++;
  }

  const targetPaths = routeCeiling(
    rows,
    cols,
    start,
    goal,
    request.minValidPaths,
    algorithm,
  );
  const budget = request.maxLoopCarves ?? rows * cols * LOOP_CARVES_PER_CELL;

  let loopCarves = 0;
  let tally = countValidPaths(grid, start, goal, targetPaths, algorithm);

  while (tally.count < targetPaths) {
    const details = {
      seed: request.seed,
      targetPaths,
      validPaths: tally.count,
      loopCarves,
    };

    if (loopCarves >= budget) {
      throw MazeError.generationFailed(
        `Found ${tally.count} of ${targetPaths} valid paths after ${loopCarves} loop carves`,
        details,
      );
    }

    const wall = pickLoopWall(grid, tally.blocked, start, goal, rng);
    if (wall === undefined) {
      throw MazeError.generationFailed(
        `Found ${tally.count} of ${targetPaths} valid paths with no wall left to open`,
        details,
      );
    }

    grid.setAt(wall, CellType.PASSAGE);
    loopCarves++;
    tally = countValidPaths(grid, start, goal, targetPaths, algorithm);
  }

  return {
    grid,
    report: {
      carvedCells,
      loopCarves,
      validPaths: tally.count,
      targetPaths,
      requestedPaths: request.minValidPaths,
      clamped: targetPaths < request.minValidPaths,
    },
  };
}
