import { describe, expect, it } from "vitest";

import {
  addableColumns,
  buildDropSteps,
  buildMigrationSteps,
  findMissingColumns,
  INDEXES,
  renderAddMissingColumns,
  renderCreateIndex,
  renderCreateTable,
  TABLE_NAMES,
  TABLES,
} from "../../src/store/postgres/schema";

function table(name: string) {
  const found = TABLES.find((entry) => entry.name === name);
  if (!found) {
    throw new Error(`missing table ${name}`);
  }
  return found;
}

describe("store/postgres/schema", () => {
  it("lists tables with every reference pointing at an earlier table", () => {
    expect(TABLES.map((entry) => entry.name)).toEqual([...TABLE_NAMES]);

    TABLES.forEach((entry, index) => {
      for (const column of entry.columns) {
        if (column.references) {
          expect(TABLE_NAMES.indexOf(column.references.table)).toBeLessThanOrEqual(index);
        }
      }
    });
  });

  it("renders create table statements with keys, defaults and foreign keys", () => {
    expect(renderCreateTable(table("report_sequences"))).toBe(
      [
        "CREATE TABLE IF NOT EXISTS report_sequences (",
        "  report_type TEXT PRIMARY KEY,",
        "  next_number INTEGER NOT NULL DEFAULT 1",
        ")",
      ].join("\n"),
    );

    expect(renderCreateTable(table("units"))).toBe(
      [
        "CREATE TABLE IF NOT EXISTS units (",
        "  unit_id TEXT PRIMARY KEY,",
        "  name TEXT NOT NULL,",
        "  parent_unit_id TEXT,",
        "  level TEXT NOT NULL,",
        "  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,",
        "  FOREIGN KEY (parent_unit_id) REFERENCES units(unit_id)",
        ")",
      ].join("\n"),
    );
  });

  it("only adds columns that are nullable or defaulted", () => {
    expect(addableColumns(table("units")).map((column) => column.name)).toEqual(["parent_unit_id", "created_at"]);
    expect(renderAddMissingColumns(table("units"))).toBe(
      [
        "ALTER TABLE units",
        "  ADD COLUMN IF NOT EXISTS parent_unit_id TEXT REFERENCES units(unit_id),",
        "  ADD COLUMN IF NOT EXISTS created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP",
      ].join("\n"),
    );
    expect(renderAddMissingColumns({ name: "units", columns: [{ name: "unit_id", type: "TEXT", primaryKey: true }] })).toBeNull();
  });

  it("lists defined columns missing from a deployment in schema order", () => {
    const present = TABLES.flatMap((entry) =>
      entry.columns.map((column) => ({ table_name: entry.name, column_name: column.name })),
    );
    expect(findMissingColumns(present)).toEqual([]);

    const legacy = present.filter(
      (row) => !(row.table_name === "comm_log" && row.column_name === "topic") && row.table_name !== "report_sequences",
    );
    expect(findMissingColumns(legacy)).toEqual([
      "comm_log.topic",
      "report_sequences.report_type",
      "report_sequences.next_number",
    ]);
  });

  it("renders index statements", () => {
    expect(renderCreateIndex({ name: "idx_reports_unit", table: "reports", columns: ["unit_id"] })).toBe(
      "CREATE INDEX IF NOT EXISTS idx_reports_unit ON reports(unit_id)",
    );
  });

  it("builds an idempotent, drop-free additive step list", () => {
    const steps = buildMigrationSteps();

    expect(steps).toHaveLength(TABLES.length * 2 + INDEXES.length + 2);
    expect(steps[0]?.id).toBe("create_table:units");
    expect(steps[1]?.id).toBe("add_columns:units");
    expect(steps.slice(-2).map((step) => step.id)).toEqual([
      "seed_sequence:frago_sequence",
      "seed_sequence:report_sequences",
    ]);
    expect(new Set(steps.map((step) => step.id)).size).toBe(steps.length);

    for (const step of steps) {
      expect(step.sql).not.toMatch(/\bDROP\b/i);
      expect(step.sql).toMatch(/IF NOT EXISTS|ON CONFLICT .* DO NOTHING/);
    }
  });

  it("seeds the FRAGO singleton and the standard report types", () => {
    const steps = buildMigrationSteps();
    const seeds = steps.filter((step) => step.id.startsWith("seed_sequence:")).map((step) => step.sql);

    expect(seeds).toEqual([
      "INSERT INTO frago_sequence (id, next_number) VALUES (1, 1) ON CONFLICT (id) DO NOTHING",
      "INSERT INTO report_sequences (report_type, next_number) VALUES ('CASEVAC', 1), ('EOINCREP', 1), ('FRAGO', 1), ('OPORD', 1) ON CONFLICT (report_type) DO NOTHING",
    ]);
  });

  it("drops children before parents", () => {
    const drops = buildDropSteps();

    expect(drops).toHaveLength(TABLE_NAMES.length);
    expect(drops[0]).toMatchObject({
      id: "drop_table:report_sequences",
      sql: "DROP TABLE IF EXISTS report_sequences CASCADE",
    });
    expect(drops[drops.length - 1]?.sql).toBe("DROP TABLE IF EXISTS units CASCADE");
  });
});
