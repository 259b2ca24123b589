import { MazeError, type Path, type Position } from "@labyrinth/contracts";
import type { Pathfinder, PathfindingTarget } from "./types";

/**
 * Shared base for search strategies.
 *
 * Holds the target; concrete strategies override `findPath`. Calling it on
 * the base itself throws a `NOT_IMPLEMENTED` MazeError.
 */
export class PathfinderBase implements Pathfinder {
  constructor(readonly maze: PathfindingTarget) {}

  findPath(_start: Position, _goal: Position): Path | null {
    throw MazeError.notImplemented(`${this.constructor.name}.findPath`);
  }
}
