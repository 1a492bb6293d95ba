import * as dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { runPlaceDepots, runRebalance } from "./batch.js";
import type { BatchReport } from "./batch.js";
import { parseCliArgs } from "./cli.js";
import { getConfig } from "./config.js";
import { runInspect } from "./inspect.js";
import { createLogger } from "./logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function reportFields(report: BatchReport) {
  return {
    processed: report.processed.length,
    skipped: report.skipped.length,
    failed: report.failed.map((failure) => failure.label)
  };
}

export function main(argv: string[]): number {
  const config = getConfig();
  const logger = createLogger(config.LOG_LEVEL);
  const options = parseCliArgs(argv, config);

  switch (options.command) {
    case "rebalance": {
      const report = runRebalance(options, logger);
      logger.info({ command: options.command, output: options.outputDir, ...reportFields(report) }, "batch complete");
      break;
    }
    case "place-depots": {
      const report = runPlaceDepots(options, logger);
      logger.info(
        { command: options.command, factor: options.factor, placement: options.placement, ...reportFields(report) },
        "batch complete"
      );
      break;
    }
    case "inspect": {
      if (options.file) {
        runInspect(options.file, options.factor, logger);
      }
      break;
    }
  }

  return 0;
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
  try {
    process.exitCode = main(process.argv.slice(2));
  } catch (err) {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
