/**
 * Structural problem in one scenario file. Fatal for that file only.
 */
export class FormatError extends Error {
  lineNumber: number | null;

  constructor(message: string, lineNumber: number | null = null) {
    super(lineNumber === null ? message : `line ${lineNumber}: ${message}`);
    this.lineNumber = lineNumber;
    this.name = "FormatError";
  }
}

export function isFormatError(error: unknown): error is FormatError {
  return error instanceof FormatError;
}

export type WeightFallbackWarning = {
  kind: "weight-fallback";
  lineNumber: number;
  line: string;
};

export type MissingFileWarning = {
  kind: "missing-file";
  path: string;
};

export type ScenarioWarning = WeightFallbackWarning | MissingFileWarning;

export function describeWarning(warning: ScenarioWarning): string {
  switch (warning.kind) {
    case "weight-fallback":
      return `line ${warning.lineNumber}: no edge weight found, using default 1.0`;
    case "missing-file":
      return `missing ${warning.path}, skipping`;
  }
}
