export type {
  NodeId,
  GraphEdge,
  Graph,
  EdgeRecord,
  CoverageMap,
  SelectionStep,
  DepotSelection,
} from "./types.js";

export type { DepotPlan } from "./depots.js";

export { buildGraph, dedupeEdges, edgeKey } from "./graph.js";
export { PriorityQueue } from "./priority-queue.js";
export { distancesWithin, computeCoverage, coverageRadius } from "./dijkstra.js";
export { selectDepots, placeDepots } from "./depots.js";
