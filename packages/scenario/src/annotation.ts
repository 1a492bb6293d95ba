export const DEFAULT_EDGE_WEIGHT = 1.0;

// Checked in order; the first token present wins
const WEIGHT_TOKENS = ["weight", "cost"];

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type WeightFallback = "missing" | "unparseable";

export type ExtractedWeight = {
  weight: number;
  /** Why the default was used, or null when the annotation gave the weight */
  fallback: WeightFallback | null;
};

/**
 * Read the travel time from an edge annotation such as "edge weight 3.5" or
 * "cost 12". Everything after the token must be the number.
 */
export function extractWeight(annotation: string): ExtractedWeight {
  const token = WEIGHT_TOKENS.find((candidate) => annotation.includes(candidate));
  if (!token) {
    return { weight: DEFAULT_EDGE_WEIGHT, fallback: "missing" };
  }

  const raw = annotation.slice(annotation.indexOf(token) + token.length).trim();
  if (!DECIMAL.test(raw)) {
    return { weight: DEFAULT_EDGE_WEIGHT, fallback: "unparseable" };
  }

  const weight = Number(raw);
  if (!Number.isFinite(weight) || weight < 0) {
    return { weight: DEFAULT_EDGE_WEIGHT, fallback: "unparseable" };
  }

  return { weight, fallback: null };
}

export type EdgeLine = {
  u: number;
  v: number;
  annotation: string;
};

const EDGE_LINE = /^\(\s*(\d+)\s*,\s*(\d+)\s*\)(.*)$/;

export function isEdgeLine(line: string): boolean {
  return line.trim().startsWith("(");
}

/**
 * Split "(u,v) annotation" into its endpoints and free text.
 * Returns null when the line starts like an edge but the marker is malformed.
 */
export function parseEdgeLine(line: string): EdgeLine | null {
  const match = EDGE_LINE.exec(line.trim());
  if (!match) {
    return null;
  }
  return {
    u: Number(match[1]),
    v: Number(match[2]),
    annotation: match[3].trim()
  };
}

export function formatEdgeLine(u: number, v: number, weight: number): string {
  return `(${u},${v}) edge weight ${weight}`;
}
