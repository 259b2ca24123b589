/**
 * Generators module - maze carving algorithms.
 */

// Prim Generator - randomized spanning tree plus loop carving
export {
  carveSpanningTree,
  countValidPaths,
  type GenerationReport,
  generatePrimMaze,
  type PathCount,
  pickLoopWall,
  type PrimMazeRequest,
  type PrimMazeResult,
  routeCeiling,
} from "./prim";
