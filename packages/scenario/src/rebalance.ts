import { vehicleCountForDepots } from "@depot-planner/config";
import { isEdgeLine } from "./annotation.js";
import { FormatError } from "./errors.js";
import {
  KEY_DEPOT,
  KEY_NON_REQUIRED_COUNT,
  KEY_REQUIRED_COUNT,
  KEY_VEHICLES,
  MARKER_NON_REQUIRED,
  MARKER_REQUIRED,
  hasKey,
  headerLine,
  headerValue,
  isLabeledLine,
  isSectionMarker,
  parseDepotTokens
} from "./format.js";

export type RawLineSections = {
  /** Everything up to and including the LIST_REQUIRED_EDGES: marker */
  header: string[];
  required: string[];
  nonRequired: string[];
  /** Labeled lines met inside the edge blocks, then the first section marker after them and everything after it */
  footer: string[];
};

export type RebalanceResult = {
  lines: string[];
  depotCount: number;
  vehicleCount: number;
  requiredCount: number;
  nonRequiredCount: number;
  targetRequired: number;
};

type Section = "header" | "required" | "nonRequired" | "footer";

/**
 * Split scenario lines into header, edge blocks and footer. Edge lines are kept
 * as opaque text; blank and unlabeled stray lines inside the edge blocks are
 * dropped.
 */
export function splitSections(lines: string[]): RawLineSections {
  const sections: RawLineSections = { header: [], required: [], nonRequired: [], footer: [] };
  let section: Section = "header";

  for (const line of lines) {
    const stripped = line.trim();

    if (stripped.startsWith(MARKER_REQUIRED) && section !== "footer") {
      section = "required";
      sections.header.push(line);
      continue;
    }
    if (stripped.startsWith(MARKER_NON_REQUIRED) && section !== "footer") {
      section = "nonRequired";
      continue;
    }

    switch (section) {
      case "header":
        sections.header.push(line);
        break;
      case "required":
      case "nonRequired":
        if (isEdgeLine(stripped)) {
          (section === "required" ? sections.required : sections.nonRequired).push(line);
        } else if (isSectionMarker(stripped)) {
          section = "footer";
          sections.footer.push(line);
        } else if (isLabeledLine(stripped)) {
          // Header lines written between edges (DEPOT, NUMBER OF VEHICLES) move below them
          sections.footer.push(line);
        }
        break;
      case "footer":
        sections.footer.push(line);
        break;
    }
  }

  if (section === "header") {
    throw new FormatError(`${MARKER_REQUIRED} marker not found`);
  }

  return sections;
}

function countDepots(lines: string[]): number {
  const depotLine = lines.find((line) => hasKey(line, `${KEY_DEPOT}:`));
  if (!depotLine) {
    return 0;
  }
  // Unreadable tokens still count; the line is carried through untouched
  const value = headerValue(depotLine);
  return parseDepotTokens(value)?.length ?? value.split(/[,\s]+/).filter(Boolean).length;
}

/**
 * Move edges between the required and non-required lists until required holds
 * ceil(total / 2) of them, then rewrite the count lines the file already has.
 *
 * Surplus required edges leave from the end of the required list and go to the
 * front of the non-required list; missing ones are taken from the front of the
 * non-required list in order. Connectivity of the required edges is not
 * re-checked after the move.
 */
export function rebalanceRequiredEdges(lines: string[]): RebalanceResult {
  const { header, required, nonRequired, footer } = splitSections(lines);

  const total = required.length + nonRequired.length;
  const targetRequired = Math.ceil(total / 2);

  const nextRequired = required.slice();
  const nextNonRequired = nonRequired.slice();
  if (nextRequired.length > targetRequired) {
    const surplus = nextRequired.splice(targetRequired);
    nextNonRequired.unshift(...surplus);
  } else {
    // splice stops at the end of the list if non-required runs short
    const moved = nextNonRequired.splice(0, targetRequired - nextRequired.length);
    nextRequired.push(...moved);
  }

  const assembled = [...header, ...nextRequired, MARKER_NON_REQUIRED, ...nextNonRequired, ...footer];

  const depotCount = countDepots(assembled);
  const vehicleCount = vehicleCountForDepots(depotCount);

  const rewritten = assembled.map((line) => {
    if (hasKey(line, KEY_REQUIRED_COUNT)) {
      return headerLine(KEY_REQUIRED_COUNT, nextRequired.length);
    }
    if (hasKey(line, KEY_NON_REQUIRED_COUNT)) {
      return headerLine(KEY_NON_REQUIRED_COUNT, nextNonRequired.length);
    }
    if (hasKey(line, KEY_VEHICLES)) {
      return headerLine(KEY_VEHICLES, vehicleCount);
    }
    return line;
  });

  return {
    lines: rewritten,
    depotCount,
    vehicleCount,
    requiredCount: nextRequired.length,
    nonRequiredCount: nextNonRequired.length,
    targetRequired
  };
}
