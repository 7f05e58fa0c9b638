import { describe, expect, it } from "vitest";

import {
  buildUnitForest,
  orderParentsFirst,
  unitLineage,
  validateUnitForest,
  type UnitLink,
} from "../../src/hierarchy/forest";

const SEEDED: UnitLink[] = [
  { unit_id: "BAT_1", parent_unit_id: null },
  { unit_id: "CO_A", parent_unit_id: "BAT_1" },
  { unit_id: "CO_B", parent_unit_id: "BAT_1" },
  { unit_id: "PLT_1", parent_unit_id: "CO_A" },
  { unit_id: "SQD_1", parent_unit_id: "PLT_1" },
];

describe("hierarchy/forest", () => {
  it("accepts a valid forest, including several roots", () => {
    expect(validateUnitForest(SEEDED)).toEqual([]);
    expect(validateUnitForest([...SEEDED, { unit_id: "BAT_2", parent_unit_id: null }])).toEqual([]);
    expect(validateUnitForest([])).toEqual([]);
  });

  it("flags duplicates, self parents and missing parents in input order", () => {
    expect(
      validateUnitForest([
        { unit_id: "BAT_1", parent_unit_id: null },
        { unit_id: "CO_A", parent_unit_id: "BAT_9" },
        { unit_id: "BAT_1", parent_unit_id: null },
        { unit_id: "PLT_1", parent_unit_id: "PLT_1" },
      ]),
    ).toEqual([
      { kind: "missing_parent", unitId: "CO_A", parentId: "BAT_9" },
      { kind: "duplicate_unit", unitId: "BAT_1" },
      { kind: "self_parent", unitId: "PLT_1" },
    ]);
  });

  it("reports each cycle once, starting from its smallest id", () => {
    expect(
      validateUnitForest([
        { unit_id: "C", parent_unit_id: "A" },
        { unit_id: "A", parent_unit_id: "B" },
        { unit_id: "B", parent_unit_id: "C" },
        { unit_id: "D", parent_unit_id: "C" },
      ]),
    ).toEqual([{ kind: "cycle", unitIds: ["A", "B", "C"] }]);
  });

  it("builds root trees with children in input order", () => {
    const forest = buildUnitForest(SEEDED);

    expect(forest).toHaveLength(1);
    expect(forest[0]?.unit.unit_id).toBe("BAT_1");
    expect(forest[0]?.children.map((node) => node.unit.unit_id)).toEqual(["CO_A", "CO_B"]);
    expect(forest[0]?.children[0]?.children[0]?.children[0]?.unit.unit_id).toBe("SQD_1");
  });

  it("leaves units outside any root out of the forest", () => {
    const forest = buildUnitForest([
      { unit_id: "BAT_1", parent_unit_id: null },
      { unit_id: "X", parent_unit_id: "Y" },
      { unit_id: "Y", parent_unit_id: "X" },
    ]);

    expect(forest.map((node) => node.unit.unit_id)).toEqual(["BAT_1"]);
    expect(forest[0]?.children).toEqual([]);
  });

  it("returns the lineage from the root down", () => {
    expect(unitLineage(SEEDED, "SQD_1")).toEqual(["BAT_1", "CO_A", "PLT_1", "SQD_1"]);
    expect(unitLineage(SEEDED, "BAT_1")).toEqual(["BAT_1"]);
    expect(unitLineage(SEEDED, "UNKNOWN")).toBeNull();
    expect(unitLineage([{ unit_id: "CO_A", parent_unit_id: "BAT_9" }], "CO_A")).toBeNull();
  });

  it("orders parents before children without disturbing a valid order", () => {
    expect(orderParentsFirst(SEEDED)).toEqual(SEEDED);
    expect(orderParentsFirst([...SEEDED].reverse()).map((unit) => unit.unit_id)).toEqual([
      "BAT_1",
      "CO_B",
      "CO_A",
      "PLT_1",
      "SQD_1",
    ]);
  });

  it("keeps units with broken or cyclic parents, after the rest", () => {
    const ordered = orderParentsFirst([
      { unit_id: "CO_X", parent_unit_id: "CO_Y" },
      { unit_id: "CO_Y", parent_unit_id: "CO_X" },
      { unit_id: "PLT_9", parent_unit_id: "BAT_9" },
      { unit_id: "BAT_1", parent_unit_id: null },
    ]);

    expect(ordered.map((unit) => unit.unit_id)).toEqual(["PLT_9", "BAT_1", "CO_X", "CO_Y"]);
  });
});
