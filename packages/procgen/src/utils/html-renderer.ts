/**
 * HTML Maze Renderer
 *
 * Renders a maze as a standalone HTML page: one table cell per grid cell,
 * styled by class.
 *
 * @example
 * ```typescript
 * import { createMaze, renderMazeHTML } from "@labyrinth/procgen";
 *
 * const maze = createMaze({ size: 20, seed: 42, start: [1, 1] }).getOrThrow();
 * writeFileSync("maze.html", renderMazeHTML(maze, { drawSolution: true }));
 * ```
 */

import { coordKey } from "../core/data-structures";
import { CellType } from "../core/grid";
import type { Maze } from "../maze";

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Color palette for HTML export
 */
export interface MazeColorPalette {
  readonly wall: string;
  readonly passage: string;
  readonly start: string;
  readonly goal: string;
  readonly path: string;
  readonly text: string;
  readonly background: string;
}

export const DEFAULT_PALETTE: MazeColorPalette = {
  wall: "#171717",       // neutral-900
  passage: "#e5e5e5",    // neutral-200
  start: "#22c55e",      // green-500
  goal: "#ef4444",       // red-500
  path: "#f59e0b",       // amber-500
  text: "#e5e5e5",
  background: "#0a0a0a",
};

export interface MazeHTMLOptions {
  /** Mark the start→goal route (default: false) */
  readonly drawSolution?: boolean;
  /** Page title (default: "Maze #<seed>") */
  readonly title?: string;
  /** Cell edge in pixels (default: 12) */
  readonly cellSize?: number;
  readonly palette?: MazeColorPalette;
}

// =============================================================================
// RENDERING
// =============================================================================

/**
 * Render a maze as an HTML document.
 *
 * With `drawSolution`, the cached `maze.path` is drawn; when there is none a
 * search is run first, which caches its result on the maze. Every path cell,
 * endpoints included, gets the `cell-path` class.
 */
export function renderMazeHTML(
  maze: Maze,
  options: MazeHTMLOptions = {},
): string {
  const {
    drawSolution = false,
    title = `Maze #${maze.seed}`,
    cellSize = 12,
    palette = DEFAULT_PALETTE,
  } = options;

  const pathKeys = new Set<number>();
  if (drawSolution) {
    const path = maze.path ?? maze.findPath();
    for (const [row, col] of path ?? []) {
      pathKeys.add(coordKey(row, col, maze.cols));
    }
  }

  const [startRow, startCol] = maze.start;
  const [goalRow, goalCol] = maze.goal;

  const rows: string[] = [];
  for (let row = 0; row < maze.rows; row++) {
    const cells: string[] = [];
    for (let col = 0; col < maze.cols; col++) {
      const classes = [
        maze.grid.get(row, col) === CellType.PASSAGE
          ? "cell-passage"
          : "cell-wall",
      ];
      if (row === startRow && col === startCol) classes.push("cell-start");
      if (row === goalRow && col === goalCol) classes.push("cell-goal");
      if (pathKeys.has(coordKey(row, col, maze.cols))) classes.push("cell-path");
      cells.push(`<td class="${classes.join(" ")}"></td>`);
    }
    rows.push(`      <tr>${cells.join("")}</tr>`);
  }

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>
    body {
      font-family: ui-sans-serif, system-ui, sans-serif;
      background: ${palette.background};
      color: ${palette.text};
      display: flex;
      flex-direction: column;
      align-items: center;
      padding: 24px;
    }
    table { border-collapse: collapse; }
    td { width: ${cellSize}px; height: ${cellSize}px; padding: 0; }
    .cell-wall { background: ${palette.wall}; }
    .cell-passage { background: ${palette.passage}; }
    .cell-path { background: ${palette.path}; }
    .cell-start { background: ${palette.start}; }
    .cell-goal { background: ${palette.goal}; }
  </style>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  <table>
    <tbody>
${rows.join("\n")}
    </tbody>
  </table>
</body>
</html>
`;
}

/**
 * Escape HTML special characters
 */
function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}
