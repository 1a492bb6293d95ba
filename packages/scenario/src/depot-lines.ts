import { vehicleCountForDepots } from "@depot-planner/config";
import type { DepotPlacement } from "@depot-planner/config";
import type { NodeId } from "@depot-planner/pathfinding";
import { isEdgeLine } from "./annotation.js";
import { KEY_CAPACITY, KEY_DEPOT, KEY_VEHICLES, hasKey, headerLine } from "./format.js";

export type DepotRewrite = {
  lines: string[];
  depots: NodeId[];
  vehicleCount: number;
};

/**
 * Replace the DEPOT and NUMBER OF VEHICLES lines of a scenario.
 *
 * `append` puts the vehicle line and then the depot line at the end of the file.
 * `inline` puts the vehicle line right after VEHICLE CAPACITY and the depot line
 * right before the first edge; either falls back to the end of the file when its
 * anchor is missing.
 */
export function rewriteDepotLines(
  lines: string[],
  depots: Iterable<NodeId>,
  placement: DepotPlacement
): DepotRewrite {
  const sorted = Array.from(new Set(depots)).sort((a, b) => a - b);
  const vehicleCount = vehicleCountForDepots(sorted.length);
  const vehicleLine = headerLine(KEY_VEHICLES, vehicleCount);
  const depotLine = headerLine(KEY_DEPOT, sorted.join(","));

  const filtered = lines.filter((line) => !hasKey(line, `${KEY_DEPOT}:`) && !hasKey(line, KEY_VEHICLES));

  if (placement === "append") {
    return { lines: [...filtered, vehicleLine, depotLine], depots: sorted, vehicleCount };
  }

  const output = filtered.slice();
  const tail: string[] = [];

  const capacityIndex = output.findIndex((line) => hasKey(line, KEY_CAPACITY));
  if (capacityIndex === -1) {
    tail.push(vehicleLine);
  } else {
    output.splice(capacityIndex + 1, 0, vehicleLine);
  }

  const edgeIndex = output.findIndex((line) => isEdgeLine(line));
  if (edgeIndex === -1) {
    tail.push(depotLine);
  } else {
    output.splice(edgeIndex, 0, depotLine);
  }

  return { lines: [...output, ...tail], depots: sorted, vehicleCount };
}
