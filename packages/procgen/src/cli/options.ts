/**
 * Command-line options for the maze generator script.
 */

import { join } from "node:path";
import {
  buildMazeConfig,
  Err,
  MazeError,
  type Result,
  type ValidatedMazeConfig,
} from "@labyrinth/contracts";
import { MAZE_DEFAULTS } from "../config";

export interface CliOptions {
  readonly config: ValidatedMazeConfig;
  readonly output: string;
  readonly drawSolution: boolean;
  readonly ascii: boolean;
  readonly help: boolean;
}

export const HELP_TEXT = `
Maze Generator

Usage:
  npm run maze -- [options]

Options:
  --size, -s <n>            Maze edge length, at least ${MAZE_DEFAULTS.MIN_SIZE} (default: ${MAZE_DEFAULTS.SIZE})
  --seed <n>                Seed for generation (default: ${MAZE_DEFAULTS.SEED})
  --start <row> <col>       Start cell (default: ${MAZE_DEFAULTS.START.join(" ")})
  --goal <row> <col>        Goal cell (default: size-2 size-2)
  --min-valid-paths <n>     Distinct start-goal routes to carve (default: ${MAZE_DEFAULTS.MIN_VALID_PATHS})
  --output, -o <file>       HTML output file (default: {size}x{size}_seed{seed}_paths{n}_BFS_maze.html)
  --draw-solution           Mark the solution path in the HTML export
  --ascii                   Also print the maze to the terminal
  --help                    Show this help

Examples:
  npm run maze -- --size 20 --seed 7
  npm run maze -- -s 30 --start 1 1 --goal 28 28 --min-valid-paths 5 --draw-solution
`;

/**
 * File name the export is written to when `--output` is not given.
 */
export function defaultOutputPath(config: ValidatedMazeConfig): string {
  const { size, seed, minValidPaths, algorithm } = config;
  return join(
    MAZE_DEFAULTS.OUTPUT_DIR,
    `${size}x${size}_seed${seed}_paths${minValidPaths}_${algorithm.toUpperCase()}_maze.html`,
  );
}

/**
 * Parse arguments (without the node and script entries).
 *
 * Numbers are collected as given and validated by the maze config schema, so
 * `--size 3` and `--start 0 99` fail the same way a bad API config does.
 */
export function parseCliArgs(
  argv: readonly string[],
): Result<CliOptions, MazeError> {
  const raw: Record<string, unknown> = {
    size: MAZE_DEFAULTS.SIZE,
    seed: MAZE_DEFAULTS.SEED,
    start: MAZE_DEFAULTS.START,
    minValidPaths: MAZE_DEFAULTS.MIN_VALID_PATHS,
    algorithm: MAZE_DEFAULTS.ALGORITHM,
  };
  let output: string | undefined;
  let drawSolution = false;
  let ascii = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--size":
      case "-s":
        raw.size = toNumber(argv[++i]);
        break;
      case "--seed":
        raw.seed = toNumber(argv[++i]);
        break;
      case "--start":
        raw.start = [toNumber(argv[++i]), toNumber(argv[++i])];
        break;
      case "--goal":
        raw.goal = [toNumber(argv[++i]), toNumber(argv[++i])];
        break;
      case "--min-valid-paths":
        raw.minValidPaths = toNumber(argv[++i]);
        break;
      case "--output":
      case "-o":
        output = argv[++i];
        if (output === undefined || output.startsWith("-")) {
          return Err(
            MazeError.configInvalid(`${arg} requires a file path`, { arg }),
          );
        }
        break;
      case "--draw-solution":
        drawSolution = true;
        break;
      case "--ascii":
        ascii = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        return Err(
          MazeError.configInvalid(`Unknown option: ${arg}`, { arg }),
        );
    }
  }

  return buildMazeConfig(raw).map(
    (config): CliOptions => ({
      config,
      output: output ?? defaultOutputPath(config),
      drawSolution,
      ascii,
      help,
    }),
  );
}

/**
 * Missing or non-numeric values become NaN, which the schema rejects.
 */
function toNumber(value: string | undefined): number {
  if (value === undefined || value.trim() === "") return Number.NaN;
  return Number(value);
}
