export type NodeId = number;

export type GraphEdge = {
  toNode: NodeId;
  weight: number; // travel time
  required: boolean;
};

export type Graph = Map<NodeId, GraphEdge[]>; // node -> incident edges (undirected, stored both ways)

export type EdgeRecord = {
  u: NodeId;
  v: NodeId;
  weight: number;
  required: boolean;
};

export type CoverageMap = Map<NodeId, Set<NodeId>>; // node -> nodes reachable within the radius

export type SelectionStep = {
  node: NodeId;
  gain: number;
  coveredCount: number; // covered nodes after this pick
};

export type DepotSelection = {
  selected: NodeId[]; // in pick order
  covered: Set<NodeId>;
  uncovered: NodeId[];
  steps: SelectionStep[];
};
