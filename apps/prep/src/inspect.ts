import { placeDepots } from "@depot-planner/pathfinding";
import type { NodeId } from "@depot-planner/pathfinding";
import { describeWarning, parseScenario } from "@depot-planner/scenario";
import type { ParsedScenario } from "@depot-planner/scenario";
import { readScenario } from "./files.js";
import type { Logger } from "./logger.js";

export type ScenarioSummary = {
  name: string | null;
  nodes: number;
  edges: number;
  requiredEdges: number;
  nonRequiredEdges: number;
  batteryCapacity: number;
  radius: number;
  fileDepots: NodeId[];
  placedDepots: NodeId[];
  vehicles: number;
  uncovered: NodeId[];
  weightFallbacks: number;
};

/**
 * Compare the depots written in a scenario with a fresh greedy placement.
 */
export function summarizeScenario(scenario: ParsedScenario, factor: number): ScenarioSummary {
  const plan = placeDepots(scenario.graph, scenario.nodes, scenario.metadata.batteryCapacity, factor);
  const requiredEdges = scenario.edges.filter((edge) => edge.required).length;

  return {
    name: scenario.name,
    nodes: scenario.nodes.length,
    edges: scenario.edges.length,
    requiredEdges,
    nonRequiredEdges: scenario.edges.length - requiredEdges,
    batteryCapacity: scenario.metadata.batteryCapacity,
    radius: plan.radius,
    fileDepots: scenario.metadata.depots,
    placedDepots: plan.depots,
    vehicles: plan.vehicleCount,
    uncovered: plan.selection.uncovered,
    weightFallbacks: scenario.warnings.length
  };
}

export function runInspect(file: string, factor: number, logger: Logger): ScenarioSummary {
  const scenario = parseScenario(readScenario(file));
  const summary = summarizeScenario(scenario, factor);

  for (const warning of scenario.warnings) {
    logger.warn({ file, kind: warning.kind }, describeWarning(warning));
  }
  logger.info({ file, ...summary }, "scenario summary");
  return summary;
}
