/**
 * Data Structures - queue and coordinate set for grid searches
 */

export {
  CoordSet,
  coordKey,
  FastQueue,
} from "./fast-queue";
