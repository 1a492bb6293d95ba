// Header keys and section markers of the failure-scenario text format

export const KEY_NAME = "NAME";
export const KEY_VERTICES = "NUMBER OF VERTICES";
export const KEY_CAPACITY = "VEHICLE CAPACITY";
export const KEY_REQUIRED_COUNT = "NUMBER OF REQUIRED_EDGES";
export const KEY_NON_REQUIRED_COUNT = "NUMBER OF NON_REQUIRED_EDGES";
export const KEY_VEHICLES = "NUMBER OF VEHICLES";
export const KEY_DEPOT = "DEPOT";

export const MARKER_REQUIRED = "LIST_REQUIRED_EDGES:";
export const MARKER_NON_REQUIRED = "LIST_NON_REQUIRED_EDGES:";
export const MARKER_FAILURE = "FAILURE_SCENARIO:";

// "KEY: value" or "KEY : value"; keys are upper-case words, spaces and underscores
const LABELED_LINE = /^[A-Z][A-Z0-9_ ]*\s*:/;

const HEADER_KEYS = [
  KEY_NAME,
  KEY_VERTICES,
  KEY_CAPACITY,
  KEY_REQUIRED_COUNT,
  KEY_NON_REQUIRED_COUNT,
  KEY_VEHICLES,
  KEY_DEPOT
];

export function isLabeledLine(line: string): boolean {
  return LABELED_LINE.test(line.trim());
}

/**
 * A line ending in ":" that is not a header key, such as "FAILURE_SCENARIO:"
 * or "Failure scenario:", opens a new section. An empty "DEPOT:" is still a
 * header line.
 */
export function isSectionMarker(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.endsWith(":") && !HEADER_KEYS.some((key) => trimmed.startsWith(key));
}

export function hasKey(line: string, key: string): boolean {
  return line.trim().startsWith(key);
}

/**
 * Value after the first colon of a header line, trimmed.
 */
export function headerValue(line: string): string {
  const colon = line.indexOf(":");
  return colon === -1 ? "" : line.slice(colon + 1).trim();
}

export function headerLine(key: string, value: string | number): string {
  return `${key}: ${value}`;
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  // A trailing newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function joinLines(lines: string[]): string {
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}

/**
 * Depot ids from the value of a DEPOT line: comma and/or whitespace separated.
 * Returns null when any token is not a positive integer.
 */
export function parseDepotTokens(value: string): number[] | null {
  const tokens = value.split(/[,\s]+/).filter((token) => token.length > 0);
  const depots: number[] = [];
  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      return null;
    }
    depots.push(Number(token));
  }
  return depots;
}
