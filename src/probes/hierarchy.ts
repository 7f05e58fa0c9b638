import type { ApiClient } from "../api/client";
import { unitLineage, validateUnitForest, type UnitLink } from "../hierarchy/forest";
import type { HierarchyUnit } from "../schemas/api";
import type { Probe } from "./types";

export const SEEDED_LINEAGE = ["BAT_1", "CO_A", "PLT_1", "SQD_1"] as const;

/**
 * Flattens a hierarchy payload that may be flat, nested, or both. Nested
 * children without an explicit parent inherit the enclosing unit; the first
 * occurrence of an id wins.
 */
export function flattenHierarchy(units: readonly HierarchyUnit[]): UnitLink[] {
  const links: UnitLink[] = [];
  const seen = new Set<string>();

  const visit = (unit: HierarchyUnit, enclosingId: string | null) => {
    if (!seen.has(unit.unit_id)) {
      seen.add(unit.unit_id);
      links.push({ unit_id: unit.unit_id, parent_unit_id: unit.parent_unit_id ?? enclosingId });
    }
    for (const child of unit.children ?? []) {
      visit(child, unit.unit_id);
    }
  };

  for (const unit of units) {
    visit(unit, null);
  }

  return links;
}

export function checkSeededLineage(links: readonly UnitLink[]): string {
  const known = new Set(links.map((link) => link.unit_id));
  const missing = SEEDED_LINEAGE.filter((unitId) => !known.has(unitId));
  if (missing.length > 0) {
    throw new Error(`Missing seeded units: ${missing.join(", ")}`);
  }

  const violations = validateUnitForest(links);
  if (violations.length > 0) {
    throw new Error(`Hierarchy is not a forest (${violations.length} violations)`);
  }

  const target = SEEDED_LINEAGE[SEEDED_LINEAGE.length - 1];
  const lineage = unitLineage(links, target) ?? [];
  if (lineage.join(" -> ") !== SEEDED_LINEAGE.join(" -> ")) {
    throw new Error(`Unexpected lineage for ${target}: ${lineage.join(" -> ") || "none"}`);
  }

  return `${links.length} units; ${lineage.join(" -> ")}`;
}

export function hierarchyProbe(client: ApiClient): Probe {
  return {
    name: "hierarchy linkage",
    async run() {
      const hierarchy = await client.getHierarchy();
      return checkSeededLineage(flattenHierarchy(hierarchy.units));
    },
  };
}
