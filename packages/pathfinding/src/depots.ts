import { vehicleCountForDepots } from "@depot-planner/config";
import { computeCoverage, coverageRadius } from "./dijkstra.js";
import { PriorityQueue } from "./priority-queue.js";
import type { CoverageMap, DepotSelection, Graph, NodeId, SelectionStep } from "./types.js";

type Candidate = {
  node: NodeId;
  order: number; // position in the caller's node order, breaks gain ties
  gain: number;
  round: number; // selection round the gain was computed in
};

function marginalGain(reach: Set<NodeId> | undefined, covered: Set<NodeId>): number {
  if (!reach) return 0;
  let gain = 0;
  for (const node of reach) {
    if (!covered.has(node)) gain += 1;
  }
  return gain;
}

/**
 * Greedy maximum coverage.
 *
 * Each round picks the unselected node whose coverage adds the most uncovered
 * nodes, preferring the earliest node in `allNodes` on ties. Gains only shrink as
 * coverage grows, so stale heap entries are re-scored lazily instead of
 * rescanning every node each round; the picks match a full rescan.
 *
 * Stops once every node is covered or no candidate adds anything. Nodes that
 * stay out of reach are reported in `uncovered`.
 */
export function selectDepots(coverage: CoverageMap, allNodes: Iterable<NodeId>): DepotSelection {
  const nodes = Array.from(allNodes);
  const target = new Set(nodes);
  const covered = new Set<NodeId>();
  const selected: NodeId[] = [];
  const steps: SelectionStep[] = [];

  const queue = new PriorityQueue<Candidate>((a, b) => b.gain - a.gain || a.order - b.order);
  const seen = new Set<NodeId>();
  nodes.forEach((node, order) => {
    if (seen.has(node)) return;
    seen.add(node);
    queue.push({ node, order, gain: marginalGain(coverage.get(node), covered), round: 0 });
  });

  let round = 0;
  let coveredTargets = 0;
  while (coveredTargets < target.size && queue.size > 0) {
    const candidate = queue.pop();
    if (!candidate) break;

    if (candidate.round !== round) {
      candidate.gain = marginalGain(coverage.get(candidate.node), covered);
      candidate.round = round;
      queue.push(candidate);
      continue;
    }

    if (candidate.gain <= 0) {
      break;
    }

    selected.push(candidate.node);
    for (const node of coverage.get(candidate.node) ?? []) {
      if (covered.has(node)) continue;
      covered.add(node);
      if (target.has(node)) coveredTargets += 1;
    }
    steps.push({ node: candidate.node, gain: candidate.gain, coveredCount: covered.size });
    round += 1;
  }

  return {
    selected,
    covered,
    uncovered: nodes.filter((node) => !covered.has(node)),
    steps
  };
}

export type DepotPlan = {
  radius: number;
  selection: DepotSelection;
  depots: NodeId[]; // ascending
  vehicleCount: number;
};

/**
 * Place depots so every node sits within capacity / factor of one, where the
 * graph allows it.
 */
export function placeDepots(
  graph: Graph,
  nodes: NodeId[],
  batteryCapacity: number,
  factor: number
): DepotPlan {
  const radius = coverageRadius(batteryCapacity, factor);
  const coverage = computeCoverage(graph, radius, nodes);
  const selection = selectDepots(coverage, nodes);
  const depots = selection.selected.slice().sort((a, b) => a - b);

  return {
    radius,
    selection,
    depots,
    vehicleCount: vehicleCountForDepots(depots.length)
  };
}
