import { PriorityQueue } from "./priority-queue.js";
import type { CoverageMap, Graph, NodeId } from "./types.js";

type QueueEntry = { node: NodeId; distance: number };

/**
 * Dijkstra from a single source that stops expanding past `cutoff`.
 * Returns the distance of every node within the cutoff, the source included.
 */
export function distancesWithin(graph: Graph, source: NodeId, cutoff: number): Map<NodeId, number> {
  const settled = new Map<NodeId, number>();
  const best = new Map<NodeId, number>([[source, 0]]);
  const queue = new PriorityQueue<QueueEntry>((a, b) => a.distance - b.distance);
  queue.push({ node: source, distance: 0 });

  while (queue.size > 0) {
    const entry = queue.pop();
    if (!entry) break;
    if (settled.has(entry.node)) continue;
    // Stale entry superseded by a shorter one
    if (entry.distance > (best.get(entry.node) ?? Infinity)) continue;

    settled.set(entry.node, entry.distance);

    for (const edge of graph.get(entry.node) ?? []) {
      if (settled.has(edge.toNode)) continue;
      const tentative = entry.distance + edge.weight;
      if (tentative > cutoff) continue;
      if (tentative < (best.get(edge.toNode) ?? Infinity)) {
        best.set(edge.toNode, tentative);
        queue.push({ node: edge.toNode, distance: tentative });
      }
    }
  }

  return settled;
}

function assertRadius(radius: number) {
  if (Number.isNaN(radius) || radius < 0) {
    throw new RangeError(`Coverage radius must be a non-negative number, got ${radius}`);
  }
}

/**
 * Nodes reachable from each node within `radius`, using edge weight as distance.
 * Required and non-required edges both carry traffic here.
 */
export function computeCoverage(
  graph: Graph,
  radius: number,
  nodes: Iterable<NodeId> = graph.keys()
): CoverageMap {
  assertRadius(radius);

  const coverage: CoverageMap = new Map();
  for (const node of nodes) {
    coverage.set(node, new Set(distancesWithin(graph, node, radius).keys()));
  }
  return coverage;
}

/**
 * Radius a depot serves: the battery capacity divided by a safety factor.
 */
export function coverageRadius(batteryCapacity: number, factor: number): number {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RangeError(`Coverage factor must be a positive number, got ${factor}`);
  }
  return batteryCapacity / factor;
}
