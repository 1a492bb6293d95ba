import fs from "node:fs";
import path from "node:path";
import { familyDirName, getInstanceFamily, scenarioFileName } from "@depot-planner/config";

export type ScenarioJob = {
  label: string; // e.g. gdb.12
  inputPath: string;
  outputPath: string;
};

/**
 * Delete and recreate a directory so no output from an earlier run survives.
 */
export function recreateDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Refuse layouts where clearing the output would delete the input.
 */
export function assertSeparateDirs(inputDir: string, outputDir: string): void {
  const input = path.resolve(inputDir);
  const output = path.resolve(outputDir);
  const relative = path.relative(output, input);
  if (relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative))) {
    throw new Error(`Output directory ${outputDir} must not contain the input directory ${inputDir}`);
  }
}

/**
 * <base>/<family>_failure_scenarios/<family>.<n>.txt for n = 1..scenarioCount.
 */
export function familyJobs(inputBase: string, outputBase: string, familyIds: string[]): ScenarioJob[] {
  const jobs: ScenarioJob[] = [];
  for (const familyId of familyIds) {
    const family = getInstanceFamily(familyId);
    const dirName = familyDirName(family.familyId);
    for (let scenario = 1; scenario <= family.scenarioCount; scenario += 1) {
      const fileName = scenarioFileName(family.familyId, scenario);
      jobs.push({
        label: `${family.familyId}.${scenario}`,
        inputPath: path.join(inputBase, dirName, fileName),
        outputPath: path.join(outputBase, dirName, fileName)
      });
    }
  }
  return jobs;
}

/**
 * Every .txt file directly inside `inputDir`, sorted by name.
 */
export function directoryJobs(inputDir: string, outputDir: string): ScenarioJob[] {
  return fs
    .readdirSync(inputDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".txt"))
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({
      label: name.replace(/\.txt$/, ""),
      inputPath: path.join(inputDir, name),
      outputPath: path.join(outputDir, name)
    }));
}

export function readScenario(filePath: string): string {
  return fs.readFileSync(filePath, "utf8");
}

/**
 * Create the parent directory of every job's output.
 */
export function ensureOutputDirs(jobs: ScenarioJob[]): void {
  for (const dir of new Set(jobs.map((job) => path.dirname(job.outputPath)))) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function writeScenario(filePath: string, text: string): void {
  fs.writeFileSync(filePath, text);
}

export function scenarioExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}
