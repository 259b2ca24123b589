/**
 * ASCII Maze Renderer
 *
 * Renders mazes as text for terminals and debugging.
 */

import { coordKey } from "../core/data-structures";
import { CellType } from "../core/grid";
import type { Maze } from "../maze";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * ASCII character mapping for cell types
 */
export interface AsciiCharset {
  readonly wall: string;
  readonly passage: string;
  readonly start: string;
  readonly goal: string;
  readonly path: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "█",
  passage: " ",
  start: "S",
  goal: "G",
  path: "·",
};

/**
 * Simple ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  wall: "#",
  passage: ".",
  start: "S",
  goal: "G",
  path: "*",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Overlay the cached `maze.path` (default: true) */
  readonly showPath?: boolean;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render a maze as ASCII art, one line per row.
 *
 * Unlike the HTML export this never searches: only an already cached path is
 * drawn.
 */
export function renderAscii(maze: Maze, options: RenderOptions = {}): string {
  const { charset = DEFAULT_CHARSET, showPath = true } = options;

  const pathKeys = new Set<number>();
  if (showPath && maze.path) {
    for (const [row, col] of maze.path) {
      pathKeys.add(coordKey(row, col, maze.cols));
    }
  }

  const [startRow, startCol] = maze.start;
  const [goalRow, goalCol] = maze.goal;
  const lines: string[] = [];

  for (let row = 0; row < maze.rows; row++) {
    let line = "";
    for (let col = 0; col < maze.cols; col++) {
      if (row === startRow && col === startCol) {
        line += charset.start;
      } else if (row === goalRow && col === goalCol) {
        line += charset.goal;
      } else if (pathKeys.has(coordKey(row, col, maze.cols))) {
        line += charset.path;
      } else {
        line +=
          maze.grid.get(row, col) === CellType.PASSAGE
            ? charset.passage
            : charset.wall;
      }
    }
    lines.push(line);
  }

  return lines.join("\n");
}
