/**
 * Prim Generator Constants
 */

/** A frontier cell is carved only when exactly this many passages touch it */
export const TREE_CARVE_NEIGHBOURS = 1;

/** Loop-carving budget per grid cell when no explicit budget is given */
export const LOOP_CARVES_PER_CELL = 1;
