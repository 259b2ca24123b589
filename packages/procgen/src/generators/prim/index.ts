export { LOOP_CARVES_PER_CELL, TREE_CARVE_NEIGHBOURS } from "./constants";
export {
  type GenerationReport,
  generatePrimMaze,
  type PrimMazeRequest,
  type PrimMazeResult,
} from "./generator";
export { carveSpanningTree, pickLoopWall } from "./passes";
export { countValidPaths, type PathCount, routeCeiling } from "./path-count";
