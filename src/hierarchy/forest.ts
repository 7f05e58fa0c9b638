export interface UnitLink {
  unit_id: string;
  parent_unit_id: string | null;
}

export type ForestViolation =
  | { kind: "duplicate_unit"; unitId: string }
  | { kind: "self_parent"; unitId: string }
  | { kind: "missing_parent"; unitId: string; parentId: string }
  | { kind: "cycle"; unitIds: string[] };

export interface UnitNode<T extends UnitLink> {
  unit: T;
  children: UnitNode<T>[];
}

function indexUnits<T extends UnitLink>(units: readonly T[]): Map<string, T> {
  const byId = new Map<string, T>();
  for (const unit of units) {
    if (!byId.has(unit.unit_id)) {
      byId.set(unit.unit_id, unit);
    }
  }
  return byId;
}

function rotateToSmallest(cycle: string[]): string[] {
  let start = 0;
  cycle.forEach((id, index) => {
    if (id < cycle[start]) {
      start = index;
    }
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

/**
 * Checks that parent links form a forest: unique ids, every parent exists,
 * no unit is its own ancestor. An empty result means the hierarchy is valid.
 */
export function validateUnitForest(units: readonly UnitLink[]): ForestViolation[] {
  const violations: ForestViolation[] = [];
  const byId = indexUnits(units);

  const seen = new Set<string>();
  for (const unit of units) {
    if (seen.has(unit.unit_id)) {
      violations.push({ kind: "duplicate_unit", unitId: unit.unit_id });
      continue;
    }
    seen.add(unit.unit_id);

    const parentId = unit.parent_unit_id;
    if (parentId === null) {
      continue;
    }
    if (parentId === unit.unit_id) {
      violations.push({ kind: "self_parent", unitId: unit.unit_id });
    } else if (!byId.has(parentId)) {
      violations.push({ kind: "missing_parent", unitId: unit.unit_id, parentId });
    }
  }

  // 1 = on the current walk, 2 = finished
  const state = new Map<string, 1 | 2>();
  for (const start of byId.keys()) {
    if (state.has(start)) {
      continue;
    }

    const path: string[] = [];
    let current: string | null = start;
    while (current !== null && !state.has(current)) {
      const node = byId.get(current);
      if (!node) {
        break;
      }
      state.set(current, 1);
      path.push(current);
      current = node.parent_unit_id === current ? null : node.parent_unit_id;
    }

    if (current !== null && state.get(current) === 1) {
      violations.push({ kind: "cycle", unitIds: rotateToSmallest(path.slice(path.indexOf(current))) });
    }

    for (const id of path) {
      state.set(id, 2);
    }
  }

  return violations;
}

/** Root trees of the hierarchy. Units unreachable from a root are left out. */
export function buildUnitForest<T extends UnitLink>(units: readonly T[]): UnitNode<T>[] {
  const byId = indexUnits(units);
  const nodes = new Map<string, UnitNode<T>>();
  for (const unit of byId.values()) {
    nodes.set(unit.unit_id, { unit, children: [] });
  }

  const roots: UnitNode<T>[] = [];
  for (const node of nodes.values()) {
    const parentId = node.unit.parent_unit_id;
    if (parentId === null) {
      roots.push(node);
      continue;
    }
    if (parentId !== node.unit.unit_id) {
      nodes.get(parentId)?.children.push(node);
    }
  }

  return roots;
}

/**
 * Stable reordering so every parent precedes its children. Units whose parent
 * chain is broken or cyclic keep their relative order at the end.
 */
export function orderParentsFirst<T extends UnitLink>(units: readonly T[]): T[] {
  const known = new Set(units.map((unit) => unit.unit_id));
  const placed = new Set<string>();
  const ordered: T[] = [];

  let pending = [...units];
  while (pending.length > 0) {
    const deferred: T[] = [];
    for (const unit of pending) {
      const parentId = unit.parent_unit_id;
      if (parentId === null || parentId === unit.unit_id || !known.has(parentId) || placed.has(parentId)) {
        ordered.push(unit);
        placed.add(unit.unit_id);
      } else {
        deferred.push(unit);
      }
    }

    if (deferred.length === pending.length) {
      ordered.push(...deferred);
      break;
    }
    pending = deferred;
  }

  return ordered;
}

/**
 * Ids from the root down to `unitId`, or null when the unit is unknown or its
 * chain of parents is broken.
 */
export function unitLineage(units: readonly UnitLink[], unitId: string): string[] | null {
  const byId = indexUnits(units);
  const lineage: string[] = [];
  const visited = new Set<string>();

  let current: string | null = unitId;
  while (current !== null) {
    const node = byId.get(current);
    if (!node || visited.has(current)) {
      return null;
    }
    visited.add(current);
    lineage.push(current);
    current = node.parent_unit_id;
  }

  return lineage.reverse();
}
