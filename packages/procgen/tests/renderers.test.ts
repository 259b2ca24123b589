import { describe, expect, it } from "vitest";
import { Maze } from "../src/maze";
import { renderAscii, renderMazeHTML, SIMPLE_CHARSET } from "../src/utils";
import { openCornerGrid } from "./fixtures";

function openCornerMaze(): Maze {
  const maze = new Maze({ seed: 42, size: 4, start: [0, 0], goal: [3, 3] });
  maze.grid = openCornerGrid();
  return maze;
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

describe("renderMazeHTML", () => {
  it("produces a standalone document titled with the seed", () => {
    const html = renderMazeHTML(openCornerMaze());

    expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(html).toContain("<html>");
    expect(html).toContain("<body>");
    expect(html).toContain("<title>Maze #42</title>");
    expect(html).toContain("<h1>Maze #42</h1>");
  });

  it("emits one cell per grid cell with start and goal markers", () => {
    const html = renderMazeHTML(openCornerMaze());

    expect(countMatches(html, /<td /g)).toBe(16);
    expect(countMatches(html, /class="[^"]*cell-start[^"]*"/g)).toBe(1);
    expect(countMatches(html, /class="[^"]*cell-goal[^"]*"/g)).toBe(1);
    expect(countMatches(html, /class="[^"]*cell-path[^"]*"/g)).toBe(0);
    expect(html).toContain('<td class="cell-passage cell-start"></td>');
    expect(html).toContain(
      '<tr><td class="cell-wall"></td><td class="cell-wall"></td><td class="cell-passage"></td><td class="cell-passage"></td></tr>',
    );
  });

  it("marks every solution cell when asked", () => {
    const maze = openCornerMaze();
    maze.findPath();
    const html = renderMazeHTML(maze, { drawSolution: true });

    expect(countMatches(html, /class="[^"]*cell-path[^"]*"/g)).toBe(7);
    expect(html).toContain('<td class="cell-passage cell-start cell-path"></td>');
    expect(html).toContain('<td class="cell-passage cell-goal cell-path"></td>');
    expect(html).toContain(
      '<tr><td class="cell-wall"></td><td class="cell-wall"></td><td class="cell-passage cell-path"></td><td class="cell-passage"></td></tr>',
    );
  });

  it("solves the maze first when no path is cached", () => {
    const maze = openCornerMaze();
    const html = renderMazeHTML(maze, { drawSolution: true });

    expect(maze.path).toHaveLength(7);
    expect(countMatches(html, /class="[^"]*cell-path[^"]*"/g)).toBe(7);
  });

  it("escapes a custom title", () => {
    const html = renderMazeHTML(openCornerMaze(), { title: "<Maze & Co>" });
    expect(html).toContain("<title>&lt;Maze &amp; Co&gt;</title>");
  });
});

describe("renderAscii", () => {
  it("renders walls, passages and endpoints", () => {
    expect(renderAscii(openCornerMaze(), { charset: SIMPLE_CHARSET })).toBe(
      ["S...", "##..", "...#", ".#.G"].join("\n"),
    );
  });

  it("overlays a cached path", () => {
    const maze = openCornerMaze();
    maze.findPath();

    expect(renderAscii(maze, { charset: SIMPLE_CHARSET })).toBe(
      ["S**.", "##*.", "..*#", ".#*G"].join("\n"),
    );
    expect(
      renderAscii(maze, { charset: SIMPLE_CHARSET, showPath: false }),
    ).toBe(["S...", "##..", "...#", ".#.G"].join("\n"));
  });

  it("uses block characters by default", () => {
    const maze = new Maze({ seed: 1, size: 4, start: [0, 0], goal: [3, 3] });
    expect(renderAscii(maze).split("\n")[1]).toBe("████");
  });
});
