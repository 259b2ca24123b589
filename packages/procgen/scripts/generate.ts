#!/usr/bin/env node
/**
 * Maze Generator Script
 *
 * Usage:
 *   npm run maze -- [options]
 *
 * Generates one maze, solves it and writes the HTML export. Run with --help
 * for the option list.
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { formatPosition, MazeError } from "@labyrinth/contracts";
import {
  type CliOptions,
  createMaze,
  HELP_TEXT,
  type Maze,
  parseCliArgs,
  renderAscii,
  renderMazeHTML,
} from "../src";

// =============================================================================
// COLORS
// =============================================================================

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
};

const useColor = process.stdout.isTTY === true && !process.env.NO_COLOR;

function c(color: keyof typeof colors, text: string, enabled = useColor): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

// =============================================================================
// OUTPUT
// =============================================================================

function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function printHeader(options: CliOptions): void {
  const { size, seed, start, goal, minValidPaths, algorithm } = options.config;

  console.log(c("bold", "\nMaze Generator"));
  console.log(c("dim", "─".repeat(40)));
  console.log(`  Size:        ${c("cyan", `${size}x${size}`)}`);
  console.log(`  Seed:        ${c("cyan", seed.toString())}`);
  console.log(`  Start:       ${c("cyan", formatPosition(start))}`);
  console.log(`  Goal:        ${c("cyan", formatPosition(goal))}`);
  console.log(`  Min paths:   ${c("cyan", minValidPaths.toString())}`);
  console.log(`  Algorithm:   ${c("cyan", algorithm.toUpperCase())}`);
  console.log(c("dim", "─".repeat(40)));
}

function printError(error: MazeError): void {
  console.error(`${c("red", "✗")} ${error.message}`);
}

function printGeneration(maze: Maze, duration: number): void {
  const report = maze.lastGeneration;
  console.log(
    `\n${c("green", "✓")} Generated in ${c("yellow", formatDuration(duration))}`,
  );
  if (!report) return;

  console.log(
    `  Carved: ${c("cyan", report.carvedCells.toString())}  ` +
      `Loops: ${c("cyan", report.loopCarves.toString())}  ` +
      `Routes: ${c("cyan", `${report.validPaths}/${report.targetPaths}`)}`,
  );
  if (report.clamped) {
    console.warn(
      c(
        "yellow",
        `  ! Endpoints allow at most ${report.targetPaths} distinct routes (asked for ${report.requestedPaths})`,
      ),
    );
  }
}

function ensureOutputDir(file: string): void {
  const dir = dirname(file);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

// =============================================================================
// MAIN
// =============================================================================

function main(): number {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed.isErr()) {
    printError(parsed.error);
    console.error(c("dim", "Run with --help for usage."));
    return 1;
  }

  const options = parsed.value;
  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  printHeader(options);

  const started = performance.now();
  const created = createMaze(options.config);
  const duration = performance.now() - started;
  if (created.isErr()) {
    printError(created.error);
    return 1;
  }

  const maze = created.value;
  printGeneration(maze, duration);

  const path = maze.findPath();
  if (path) {
    console.log(
      `  ${maze.pathfindingAlgorithm.toUpperCase()} path length: ${c("cyan", path.length.toString())}`,
    );
  } else {
    console.warn(c("yellow", "  ! No path from start to goal"));
  }

  if (options.ascii) {
    console.log(`\n${renderAscii(maze)}`);
  }

  ensureOutputDir(options.output);
  writeFileSync(
    options.output,
    renderMazeHTML(maze, { drawSolution: options.drawSolution }),
  );
  console.log(`  ${c("dim", "→")} HTML: ${c("cyan", options.output)}\n`);
  return 0;
}

try {
  process.exitCode = main();
} catch (error) {
  if (MazeError.isMazeError(error)) {
    printError(error);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
}
