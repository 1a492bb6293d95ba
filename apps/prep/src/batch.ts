import { placeDepots } from "@depot-planner/pathfinding";
import type { DepotPlacement } from "@depot-planner/config";
import {
  describeWarning,
  isFormatError,
  joinLines,
  parseScenario,
  rebalanceRequiredEdges,
  rewriteDepotLines,
  splitLines
} from "@depot-planner/scenario";
import type { ScenarioWarning } from "@depot-planner/scenario";
import type { CliOptions } from "./cli.js";
import {
  assertSeparateDirs,
  directoryJobs,
  ensureOutputDirs,
  familyJobs,
  readScenario,
  recreateDir,
  scenarioExists,
  writeScenario
} from "./files.js";
import type { ScenarioJob } from "./files.js";
import type { Logger } from "./logger.js";

export type BatchReport = {
  processed: string[];
  skipped: string[];
  failed: { label: string; error: string }[];
};

export type TransformResult = {
  text: string;
  /** Logged with the per-file line */
  fields: Record<string, unknown>;
  warnings: ScenarioWarning[];
};

export type ScenarioTransform = (text: string) => TransformResult;

/**
 * Run `transform` over every job in order. A missing input is skipped and a
 * FormatError fails only its own file; anything else ends the batch.
 */
export function runBatch(
  jobs: ScenarioJob[],
  transform: ScenarioTransform,
  logger: Logger,
  message: string
): BatchReport {
  const report: BatchReport = { processed: [], skipped: [], failed: [] };

  for (const job of jobs) {
    if (!scenarioExists(job.inputPath)) {
      const warning: ScenarioWarning = { kind: "missing-file", path: job.inputPath };
      logger.warn({ scenario: job.label, kind: warning.kind }, describeWarning(warning));
      report.skipped.push(job.label);
      continue;
    }

    let result: TransformResult;
    try {
      result = transform(readScenario(job.inputPath));
    } catch (error) {
      if (!isFormatError(error)) {
        throw error;
      }
      logger.error({ err: error, scenario: job.label }, "scenario format error, skipping");
      report.failed.push({ label: job.label, error: error.message });
      continue;
    }

    for (const warning of result.warnings) {
      logger.warn({ scenario: job.label, kind: warning.kind }, describeWarning(warning));
    }

    writeScenario(job.outputPath, result.text);
    report.processed.push(job.label);
    logger.info({ scenario: job.label, ...result.fields }, message);
  }

  return report;
}

export function rebalanceScenarioText(text: string): TransformResult {
  const result = rebalanceRequiredEdges(splitLines(text));
  return {
    text: joinLines(result.lines),
    fields: {
      required: result.requiredCount,
      nonRequired: result.nonRequiredCount,
      depots: result.depotCount,
      vehicles: result.vehicleCount
    },
    warnings: []
  };
}

export function placeDepotsInText(text: string, factor: number, placement: DepotPlacement): TransformResult {
  const scenario = parseScenario(text);
  const plan = placeDepots(scenario.graph, scenario.nodes, scenario.metadata.batteryCapacity, factor);
  const rewrite = rewriteDepotLines(splitLines(text), plan.depots, placement);

  return {
    text: joinLines(rewrite.lines),
    fields: {
      radius: plan.radius,
      depots: rewrite.depots,
      vehicles: rewrite.vehicleCount,
      uncovered: plan.selection.uncovered.length
    },
    warnings: scenario.warnings
  };
}

function resolveJobs(options: CliOptions): ScenarioJob[] {
  assertSeparateDirs(options.inputDir, options.outputDir);
  recreateDir(options.outputDir);

  const jobs = options.directoryMode
    ? directoryJobs(options.inputDir, options.outputDir)
    : familyJobs(options.inputDir, options.outputDir, options.families);
  ensureOutputDirs(jobs);
  return jobs;
}

export function runRebalance(options: CliOptions, logger: Logger): BatchReport {
  return runBatch(resolveJobs(options), rebalanceScenarioText, logger, "rebalanced scenario");
}

export function runPlaceDepots(options: CliOptions, logger: Logger): BatchReport {
  const transform = (text: string) => placeDepotsInText(text, options.factor, options.placement);
  return runBatch(resolveJobs(options), transform, logger, "placed depots");
}
