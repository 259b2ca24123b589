/**
 * Grid module - passability grid and region queries.
 */

export * from "./flood-fill";
export { MazeGrid } from "./grid";
export * from "./types";
