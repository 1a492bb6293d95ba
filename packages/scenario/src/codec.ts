import { vehicleCountForDepots } from "@depot-planner/config";
import { buildGraph, dedupeEdges } from "@depot-planner/pathfinding";
import type { EdgeRecord, Graph, NodeId } from "@depot-planner/pathfinding";
import { extractWeight, formatEdgeLine, isEdgeLine, parseEdgeLine } from "./annotation.js";
import { FormatError } from "./errors.js";
import type { ScenarioWarning } from "./errors.js";
import {
  KEY_CAPACITY,
  KEY_DEPOT,
  KEY_NAME,
  KEY_NON_REQUIRED_COUNT,
  KEY_REQUIRED_COUNT,
  KEY_VEHICLES,
  KEY_VERTICES,
  MARKER_FAILURE,
  MARKER_NON_REQUIRED,
  MARKER_REQUIRED,
  hasKey,
  headerLine,
  headerValue,
  joinLines,
  parseDepotTokens,
  splitLines
} from "./format.js";

export type ScenarioMetadata = {
  batteryCapacity: number;
  depots: NodeId[];
  /** Derived from the depot list, never read from the file */
  vehicleCount: number;
  /** NUMBER OF VEHICLES as written in the file, if any */
  declaredVehicles: number | null;
  /** NUMBER OF VERTICES, or null when the file leaves it out */
  vertexCount: number | null;
};

export type ScenarioModel = {
  name: string | null;
  nodes: NodeId[];
  edges: EdgeRecord[];
  metadata: ScenarioMetadata;
  /** Lines of the FAILURE_SCENARIO block, kept verbatim */
  failureScenario: string[];
};

export type ParsedScenario = ScenarioModel & {
  graph: Graph;
  warnings: ScenarioWarning[];
};

type Section = "header" | "required" | "nonRequired" | "failure";

function parseCount(value: string, key: string, lineNumber: number): number {
  if (!/^\d+$/.test(value)) {
    throw new FormatError(`${key} must be a non-negative integer, got "${value}"`, lineNumber);
  }
  return Number(value);
}

function parseCapacity(value: string, lineNumber: number): number {
  const capacity = Number(value);
  if (value === "" || !Number.isFinite(capacity) || capacity <= 0) {
    throw new FormatError(`${KEY_CAPACITY} must be a positive number, got "${value}"`, lineNumber);
  }
  return capacity;
}

/**
 * Parse a failure-scenario file into its graph and depot metadata.
 *
 * Edge weights fall back to 1.0 when an annotation has no weight; those lines
 * are reported in `warnings`. A missing VEHICLE CAPACITY, a malformed edge or
 * depot line, or an edge endpoint outside 1..N throws a FormatError.
 */
export function parseScenario(text: string): ParsedScenario {
  let name: string | null = null;
  let vertexCount: number | null = null;
  let batteryCapacity: number | null = null;
  let declaredVehicles: number | null = null;
  let depots: NodeId[] = [];
  const rawEdges: EdgeRecord[] = [];
  const failureScenario: string[] = [];
  const warnings: ScenarioWarning[] = [];
  let section: Section = "header";

  const lines = splitLines(text);
  for (let index = 0; index < lines.length; index += 1) {
    const rawLine = lines[index];
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    if (line.startsWith(MARKER_REQUIRED)) {
      section = "required";
    } else if (line.startsWith(MARKER_NON_REQUIRED)) {
      section = "nonRequired";
    } else if (line.startsWith(MARKER_FAILURE)) {
      section = "failure";
    } else if (hasKey(line, KEY_NAME)) {
      name = headerValue(line);
    } else if (hasKey(line, KEY_VERTICES)) {
      vertexCount = parseCount(headerValue(line), KEY_VERTICES, lineNumber);
    } else if (hasKey(line, KEY_CAPACITY)) {
      batteryCapacity = parseCapacity(headerValue(line), lineNumber);
    } else if (hasKey(line, KEY_VEHICLES)) {
      declaredVehicles = parseCount(headerValue(line), KEY_VEHICLES, lineNumber);
    } else if (hasKey(line, `${KEY_DEPOT}:`)) {
      const parsed = parseDepotTokens(headerValue(line));
      if (!parsed) {
        throw new FormatError(`${KEY_DEPOT} must list integer node ids, got "${headerValue(line)}"`, lineNumber);
      }
      depots = parsed;
    } else if (hasKey(line, KEY_REQUIRED_COUNT) || hasKey(line, KEY_NON_REQUIRED_COUNT)) {
      // Recomputed from the edge lists on output
    } else if (section === "failure") {
      failureScenario.push(rawLine);
    } else if (section !== "header" && isEdgeLine(line)) {
      const edge = parseEdgeLine(line);
      if (!edge) {
        throw new FormatError(`malformed edge line "${line}"`, lineNumber);
      }
      const { weight, fallback } = extractWeight(edge.annotation);
      if (fallback === "missing") {
        warnings.push({ kind: "weight-fallback", lineNumber, line });
      }
      rawEdges.push({ u: edge.u, v: edge.v, weight, required: section === "required" });
    }
  }

  if (batteryCapacity === null) {
    throw new FormatError(`${KEY_CAPACITY} not found in file`);
  }

  const edges = dedupeEdges(rawEdges);
  const nodes = resolveNodes(vertexCount, edges, depots);

  return {
    name,
    nodes,
    edges,
    graph: buildGraph(nodes, edges),
    metadata: {
      batteryCapacity,
      depots,
      vehicleCount: vehicleCountForDepots(depots.length),
      declaredVehicles,
      vertexCount
    },
    failureScenario,
    warnings
  };
}

function resolveNodes(vertexCount: number | null, edges: EdgeRecord[], depots: NodeId[]): NodeId[] {
  if (vertexCount === null) {
    const seen = new Set<NodeId>(depots);
    for (const edge of edges) {
      seen.add(edge.u);
      seen.add(edge.v);
    }
    return Array.from(seen).sort((a, b) => a - b);
  }

  const inRange = (node: NodeId) => node >= 1 && node <= vertexCount;
  for (const edge of edges) {
    if (!inRange(edge.u) || !inRange(edge.v)) {
      throw new FormatError(`edge (${edge.u},${edge.v}) has an endpoint outside 1..${vertexCount}`);
    }
  }
  for (const depot of depots) {
    if (!inRange(depot)) {
      throw new FormatError(`depot ${depot} is outside 1..${vertexCount}`);
    }
  }

  return Array.from({ length: vertexCount }, (_, index) => index + 1);
}

/**
 * Write a scenario back in the text format. Counts and the vehicle line are
 * derived from the model, so the output always agrees with itself.
 */
export function serializeScenario(scenario: ScenarioModel): string {
  const required = scenario.edges.filter((edge) => edge.required);
  const nonRequired = scenario.edges.filter((edge) => !edge.required);
  const { metadata } = scenario;

  const lines: string[] = [];
  if (scenario.name !== null) {
    lines.push(headerLine(KEY_NAME, scenario.name));
  }
  if (metadata.vertexCount !== null) {
    lines.push(headerLine(KEY_VERTICES, metadata.vertexCount));
  }
  lines.push(headerLine(KEY_REQUIRED_COUNT, required.length));
  lines.push(headerLine(KEY_NON_REQUIRED_COUNT, nonRequired.length));
  lines.push(headerLine(KEY_CAPACITY, metadata.batteryCapacity));
  lines.push(headerLine(KEY_VEHICLES, vehicleCountForDepots(metadata.depots.length)));
  if (metadata.depots.length > 0) {
    lines.push(headerLine(KEY_DEPOT, metadata.depots.join(",")));
  }

  lines.push(MARKER_REQUIRED);
  for (const edge of required) {
    lines.push(formatEdgeLine(edge.u, edge.v, edge.weight));
  }
  lines.push(MARKER_NON_REQUIRED);
  for (const edge of nonRequired) {
    lines.push(formatEdgeLine(edge.u, edge.v, edge.weight));
  }

  if (scenario.failureScenario.length > 0) {
    lines.push(MARKER_FAILURE, ...scenario.failureScenario);
  }

  return joinLines(lines);
}
