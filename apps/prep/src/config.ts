import { z } from "zod";
import { DEFAULT_COVERAGE_FACTOR, DEPOT_PLACEMENTS } from "@depot-planner/config";

const configSchema = z.object({
  SCENARIO_INPUT_DIR: z.string().min(1).default("Failure_Scenarios"),
  SCENARIO_OUTPUT_DIR: z.string().min(1).default("Updated_Failure_Scenarios"),
  COVERAGE_FACTOR: z.coerce.number().positive().finite().default(DEFAULT_COVERAGE_FACTOR),
  DEPOT_PLACEMENT: z.enum(DEPOT_PLACEMENTS).default("append"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

// For testing: reset cached config
export function resetConfig(): void {
  cachedConfig = null;
}
