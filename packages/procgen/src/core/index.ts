/**
 * Core module - grid model, search structures and search strategies.
 */

export * from "./data-structures";
export * from "./grid";
export * from "./pathfinding";
