export type InstanceFamily = {
  familyId: string;
  familyName: string;
  /** Scenarios are numbered 1..scenarioCount inside the family directory */
  scenarioCount: number;
};

export const INSTANCE_FAMILIES: Record<string, InstanceFamily> = {
  gdb: {
    familyId: "gdb",
    familyName: "Golden, DeArmon & Baker",
    scenarioCount: 37
  },
  bccm: {
    familyId: "bccm",
    familyName: "Benavent, Campos, Corberán & Mota",
    scenarioCount: 108
  },
  eglese: {
    familyId: "eglese",
    familyName: "Eglese (Lancashire winter gritting)",
    scenarioCount: 112
  }
};

// Family ids end up in directory and file names
const VALID_FAMILY_ID = /^[a-z]+$/;
Object.keys(INSTANCE_FAMILIES).forEach(id => {
  if (!VALID_FAMILY_ID.test(id)) {
    throw new Error(`Invalid instance family id: ${id}. Must match /^[a-z]+$/`);
  }
});

export const FAMILY_IDS = Object.keys(INSTANCE_FAMILIES);

export const FAMILY_DIR_SUFFIX = "_failure_scenarios";

// Share of battery range a depot may serve: radius = capacity / factor
export const DEFAULT_COVERAGE_FACTOR = 2;

// A lone depot still needs two tours for the failure scenarios to stay feasible
export const SINGLE_DEPOT_VEHICLES = 2;

// Where rewritten DEPOT / NUMBER OF VEHICLES lines go in a scenario file
export const DEPOT_PLACEMENTS = ["append", "inline"] as const;

export type DepotPlacement = (typeof DEPOT_PLACEMENTS)[number];

/**
 * Vehicle count implied by a depot list.
 * One vehicle per depot, except a single depot which always gets two.
 */
export function vehicleCountForDepots(depotCount: number): number {
  if (depotCount === 1) {
    return SINGLE_DEPOT_VEHICLES;
  }
  return Math.max(0, depotCount);
}

export function familyDirName(familyId: string): string {
  return `${familyId}${FAMILY_DIR_SUFFIX}`;
}

export function scenarioFileName(familyId: string, scenario: number): string {
  return `${familyId}.${scenario}.txt`;
}

export function getInstanceFamily(familyId: string): InstanceFamily {
  // Own keys only: "constructor" and friends are not families
  const family = Object.hasOwn(INSTANCE_FAMILIES, familyId) ? INSTANCE_FAMILIES[familyId] : undefined;

  if (!family) {
    const available = FAMILY_IDS.slice().sort().join(", ");
    throw new Error(`Unknown instance family "${familyId}". Available families: ${available}`);
  }

  return family;
}
