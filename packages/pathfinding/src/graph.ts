import type { EdgeRecord, Graph, NodeId } from "./types.js";

/**
 * Build an undirected adjacency map.
 * Every node in `nodes` gets an entry even without edges; endpoints missing
 * from `nodes` are added after them.
 */
export function buildGraph(nodes: Iterable<NodeId>, edges: Iterable<EdgeRecord>): Graph {
  const graph: Graph = new Map();
  for (const node of nodes) {
    graph.set(node, []);
  }

  for (const edge of edges) {
    const fromU = graph.get(edge.u) ?? [];
    const fromV = graph.get(edge.v) ?? [];
    fromU.push({ toNode: edge.v, weight: edge.weight, required: edge.required });
    if (edge.u !== edge.v) {
      fromV.push({ toNode: edge.u, weight: edge.weight, required: edge.required });
    }
    graph.set(edge.u, fromU);
    graph.set(edge.v, fromV);
  }

  return graph;
}

export function edgeKey(u: NodeId, v: NodeId): string {
  return u <= v ? `${u}-${v}` : `${v}-${u}`;
}

/**
 * Collapse repeated undirected edges. The surviving edge keeps the position of
 * its first occurrence and the attributes of its last.
 */
export function dedupeEdges(edges: EdgeRecord[]): EdgeRecord[] {
  const byKey = new Map<string, EdgeRecord>();
  for (const edge of edges) {
    // Map keeps first insertion order when a key is overwritten
    byKey.set(edgeKey(edge.u, edge.v), edge);
  }
  return Array.from(byKey.values());
}
