import { validateUnitForest, type ForestViolation, type UnitLink } from "../../hierarchy/forest";
import { query } from "./client";
import { asNullableString, asString } from "./serializers";
import { TABLES, type TableName } from "./schema";

export interface ReferenceCheck {
  table: TableName;
  keyColumn: string;
  column: string;
  references: { table: TableName; column: string };
}

export interface OrphanReference {
  table: TableName;
  column: string;
  rowId: string;
  missingValue: string;
}

export interface IntegrityReport {
  ok: boolean;
  checkedReferences: number;
  orphans: OrphanReference[];
  forestViolations: ForestViolation[];
}

export function buildReferenceChecks(): ReferenceCheck[] {
  const checks: ReferenceCheck[] = [];

  for (const table of TABLES) {
    const key = table.columns.find((column) => column.primaryKey);
    if (!key) {
      continue;
    }

    for (const column of table.columns) {
      if (column.references) {
        checks.push({
          table: table.name,
          keyColumn: key.name,
          column: column.name,
          references: column.references,
        });
      }
    }
  }

  return checks;
}

export function renderOrphanQuery(check: ReferenceCheck): string {
  return [
    `SELECT child.${check.keyColumn}::text AS row_id, child.${check.column}::text AS missing_value`,
    `FROM ${check.table} child`,
    `LEFT JOIN ${check.references.table} parent ON parent.${check.references.column} = child.${check.column}`,
    `WHERE child.${check.column} IS NOT NULL AND parent.${check.references.column} IS NULL`,
    `ORDER BY child.${check.keyColumn}`,
  ].join("\n");
}

export async function findOrphans(check: ReferenceCheck): Promise<OrphanReference[]> {
  const result = await query<{ row_id: string; missing_value: string }>(renderOrphanQuery(check));
  return result.rows.map((row) => ({
    table: check.table,
    column: check.column,
    rowId: asString(row.row_id),
    missingValue: asString(row.missing_value),
  }));
}

export async function loadUnitLinks(): Promise<UnitLink[]> {
  const result = await query<{ unit_id: string; parent_unit_id: string | null }>(
    "SELECT unit_id, parent_unit_id FROM units ORDER BY unit_id",
  );
  return result.rows.map((row) => ({
    unit_id: asString(row.unit_id),
    parent_unit_id: asNullableString(row.parent_unit_id),
  }));
}

/**
 * Every non-null reference column must resolve to an existing row and the
 * unit hierarchy must be a forest.
 */
export async function auditDatabaseIntegrity(): Promise<IntegrityReport> {
  const checks = buildReferenceChecks();
  const orphans: OrphanReference[] = [];
  for (const check of checks) {
    orphans.push(...(await findOrphans(check)));
  }

  const forestViolations = validateUnitForest(await loadUnitLinks());

  return {
    ok: orphans.length === 0 && forestViolations.length === 0,
    checkedReferences: checks.length,
    orphans,
    forestViolations,
  };
}

export function describeForestViolation(violation: ForestViolation): string {
  switch (violation.kind) {
    case "duplicate_unit":
      return `unit ${violation.unitId} appears more than once`;
    case "self_parent":
      return `unit ${violation.unitId} is its own parent`;
    case "missing_parent":
      return `unit ${violation.unitId} references missing parent ${violation.parentId}`;
    case "cycle":
      return `cycle ${[...violation.unitIds, violation.unitIds[0]].join(" -> ")}`;
  }
}

export function formatIntegrityReport(report: IntegrityReport): string {
  const lines = [
    `Integrity audit: ${report.ok ? "PASS" : "FAIL"}`,
    `Reference columns checked: ${report.checkedReferences}`,
  ];

  for (const orphan of report.orphans) {
    lines.push(`- ${orphan.table}.${orphan.column} on ${orphan.rowId} points at missing ${orphan.missingValue}`);
  }
  for (const violation of report.forestViolations) {
    lines.push(`- ${describeForestViolation(violation)}`);
  }

  return lines.join("\n");
}
