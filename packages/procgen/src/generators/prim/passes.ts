/**
 * Prim Generator Passes
 *
 * The two carving steps: a randomized spanning tree grown from the start,
 * then single-cell loop carves that add alternate routes.
 */

import type { Position, SeededRandom } from "@labyrinth/contracts";
import { CoordSet } from "../../core/data-structures";
import {
  CellType,
  floodReachable,
  type MutableMazeGrid,
  type ReadonlyMazeGrid,
} from "../../core/grid";
import { TREE_CARVE_NEIGHBOURS } from "./constants";

// =============================================================================
// SPANNING TREE PASS
// =============================================================================

/**
 * Grow a passage tree from `start` with randomized Prim's algorithm.
 *
 * Frontier cells are drawn by PRNG index. A drawn cell is carved only when
 * exactly one passage touches it, which attaches it to the tree without
 * closing a loop; otherwise it is discarded. Runs until the frontier is
 * empty.
 *
 * @returns Number of cells carved, start included
 */
export function carveSpanningTree(
  grid: MutableMazeGrid,
  start: Position,
  rng: SeededRandom,
): number {
  const queued = new CoordSet(grid.rows, grid.cols);
  const frontier: Position[] = [];

  const addFrontier = (cell: Position) => {
    for (const neighbour of grid.getCellNeighbours(cell[0], cell[1])) {
      if (neighbour === null) continue;
      const [row, col, value] = neighbour;
      if (value !== CellType.WALL || queued.has(row, col)) continue;
      queued.add(row, col);
      frontier.push([row, col]);
    }
  };

  grid.setAt(start, CellType.PASSAGE);
  queued.add(start[0], start[1]);
  addFrontier(start);
  let carved = 1;

  while (frontier.length > 0) {
    const index = rng.index(frontier.length);
    const picked = frontier[index];
    const last = frontier.pop();
    if (picked === undefined || last === undefined) break;
    if (index < frontier.length) frontier[index] = last;

    if (grid.countPassableNeighbours(picked[0], picked[1]) === TREE_CARVE_NEIGHBOURS) {
      grid.setAt(picked, CellType.PASSAGE);
      carved++;
      addFrontier(picked);
    }
  }

  return carved;
}

// =============================================================================
// LOOP PASS
// =============================================================================

function manhattan(a: Position, b: Position): number {
  return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
}

/**
 * Pick the next wall to open so that another start→goal route can appear.
 *
 * `blocked` is the path counter's scratch grid, where every route found so
 * far has its interior walled off. Preference order:
 * 1. walls touching both the start region and the goal region of `blocked`
 *    (opening one joins them);
 * 2. walls touching the start region, nearest the goal first;
 * 3. any wall touching a passage.
 * Ties are broken by the PRNG. Returns undefined once no wall is left to
 * open.
 */
export function pickLoopWall(
  grid: ReadonlyMazeGrid,
  blocked: ReadonlyMazeGrid,
  start: Position,
  goal: Position,
  rng: SeededRandom,
): Position | undefined {
  const fromStart = floodReachable(blocked, start);
  const fromGoal = floodReachable(blocked, goal);

  const bridges: Position[] = [];
  const frontier: Position[] = [];
  const fallback: Position[] = [];

  grid.forEach((row, col, value) => {
    if (value !== CellType.WALL) return;

    let touchesStart = false;
    let touchesGoal = false;
    let touchesPassage = false;
    for (const neighbour of grid.getCellNeighbours(row, col)) {
      if (neighbour === null) continue;
      const [nr, nc, cell] = neighbour;
      if (cell === CellType.PASSAGE) touchesPassage = true;
      if (fromStart.has(nr, nc)) touchesStart = true;
      if (fromGoal.has(nr, nc)) touchesGoal = true;
    }

    if (touchesStart && touchesGoal) bridges.push([row, col]);
    else if (touchesStart) frontier.push([row, col]);
    else if (touchesPassage) fallback.push([row, col]);
  });

  if (bridges.length > 0) return rng.choice(bridges);

  if (frontier.length > 0) {
    const nearest = frontier.reduce(
      (best, cell) => Math.min(best, manhattan(cell, goal)),
      Number.POSITIVE_INFINITY,
    );
    return rng.choice(frontier.filter((cell) => manhattan(cell, goal) === nearest));
  }

  return rng.choice(fallback);
}
