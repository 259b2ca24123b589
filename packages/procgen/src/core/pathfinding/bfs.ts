/**
 * Breadth-first search over the 4-connected passage graph.
 */

import { type Path, type Position, positionsEqual } from "@labyrinth/contracts";
import { coordKey, CoordSet, FastQueue } from "../data-structures/fast-queue";
import { CellType } from "../grid/types";
import { PathfinderBase } from "./base";

/**
 * Shortest-path search for unweighted grids.
 *
 * Cells are marked visited when enqueued and neighbours are expanded up,
 * down, left, right, so ties between equally short routes always resolve
 * the same way.
 */
export class BFS extends PathfinderBase {
  findPath(start: Position, goal: Position): Path | null {
    const { grid } = this.maze;
    const startCell = grid.getAt(start);
    const goalCell = grid.getAt(goal);
    if (startCell !== CellType.PASSAGE || goalCell !== CellType.PASSAGE) {
      return null;
    }

    const visited = new CoordSet(this.maze.rows, this.maze.cols);
    const predecessors = new Map<number, Position>();
    const queue = FastQueue.from<Position>([start]);
    visited.add(start[0], start[1]);

    for (let cell = queue.dequeue(); cell !== undefined; cell = queue.dequeue()) {
      if (positionsEqual(cell, goal)) {
        const path = this.reconstruct(predecessors, start, goal);
        this.maze.path = path;
        return path;
      }

      for (const neighbour of this.maze.getCellNeighbours(cell[0], cell[1])) {
        if (neighbour === null) continue;
        const [row, col, value] = neighbour;
        if (value !== CellType.PASSAGE || visited.has(row, col)) continue;
        visited.add(row, col);
        predecessors.set(coordKey(row, col, this.maze.cols), cell);
        queue.enqueue([row, col]);
      }
    }

    return null;
  }

  private reconstruct(
    predecessors: ReadonlyMap<number, Position>,
    start: Position,
    goal: Position,
  ): Path {
    const path: Position[] = [[goal[0], goal[1]]];
    let step: Position = goal;

    while (!positionsEqual(step, start)) {
      const previous = predecessors.get(coordKey(step[0], step[1], this.maze.cols));
      if (previous === undefined) {
        throw new Error(
          `BFS predecessor chain broken at (${step[0]}, ${step[1]})`,
        );
      }
      path.push(previous);
      step = previous;
    }

    return path.reverse();
  }
}
