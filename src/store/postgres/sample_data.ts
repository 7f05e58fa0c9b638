import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { orderParentsFirst } from "../../hierarchy/forest";
import { sampleDataSchema, type SampleData } from "../../schemas/sample_data";
import type { Queryable } from "./client";
import type { TableName } from "./schema";

export const DEFAULT_SAMPLE_DATA_PATH = fileURLToPath(new URL("../../../data/sample_data.json", import.meta.url));

export interface SampleInsert {
  table: TableName;
  sql: string;
  values: unknown[];
}

export function loadSampleData(path: string = DEFAULT_SAMPLE_DATA_PATH): SampleData {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  const parsed = sampleDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "root";
    throw new Error(`Invalid sample data in ${path} at ${where}: ${issue?.message ?? "unknown issue"}`);
  }

  return parsed.data;
}

function minutesFrom(now: Date, offsetMinutes: number): Date {
  return new Date(now.getTime() + offsetMinutes * 60_000);
}

function insertStatement(table: TableName, columns: string[], conflictColumn: string): string {
  const placeholders = columns.map((_, index) => `$${index + 1}`).join(", ");
  return `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${placeholders}) ON CONFLICT (${conflictColumn}) DO NOTHING`;
}

/**
 * Expands the fixture into parameterized inserts, parents before children:
 * tables in dependency order, units sorted so a parent unit is written before
 * its subordinates. Relative minute offsets are resolved against `now`.
 */
export function buildSampleInserts(data: SampleData, now: Date): SampleInsert[] {
  const inserts: SampleInsert[] = [];

  const unitColumns = ["unit_id", "name", "parent_unit_id", "level"];
  for (const unit of orderParentsFirst(data.units)) {
    inserts.push({
      table: "units",
      sql: insertStatement("units", unitColumns, "unit_id"),
      values: [unit.unit_id, unit.name, unit.parent_unit_id, unit.level],
    });
  }

  const soldierColumns = ["soldier_id", "name", "rank", "unit_id", "device_id", "status", "last_seen"];
  for (const soldier of data.soldiers) {
    inserts.push({
      table: "soldiers",
      sql: insertStatement("soldiers", soldierColumns, "soldier_id"),
      values: [
        soldier.soldier_id,
        soldier.name,
        soldier.rank,
        soldier.unit_id,
        soldier.device_id,
        soldier.status,
        soldier.last_seen_minutes_ago === null ? null : minutesFrom(now, -soldier.last_seen_minutes_ago),
      ],
    });
  }

  const inputColumns = ["input_id", "soldier_id", "timestamp", "raw_text", "input_type", "confidence"];
  for (const input of data.raw_inputs) {
    inserts.push({
      table: "soldier_raw_inputs",
      sql: insertStatement("soldier_raw_inputs", inputColumns, "input_id"),
      values: [
        input.input_id,
        input.soldier_id,
        minutesFrom(now, -input.minutes_ago),
        input.raw_text,
        input.input_type,
        input.confidence,
      ],
    });
  }

  const reportColumns = [
    "report_id",
    "soldier_id",
    "unit_id",
    "timestamp",
    "report_type",
    "structured_json",
    "confidence",
    "source_input_id",
    "status",
  ];
  for (const report of data.reports) {
    inserts.push({
      table: "reports",
      sql: insertStatement("reports", reportColumns, "report_id"),
      values: [
        report.report_id,
        report.soldier_id,
        report.unit_id,
        minutesFrom(now, -report.minutes_ago),
        report.report_type,
        JSON.stringify(report.structured),
        report.confidence,
        report.source_input_id,
        report.status,
      ],
    });
  }

  const deviceColumns = [
    "device_id",
    "soldier_id",
    "status",
    "last_heartbeat",
    "battery_level",
    "signal_strength",
    "location_lat",
    "location_lon",
  ];
  for (const device of data.device_status) {
    inserts.push({
      table: "device_status",
      sql: insertStatement("device_status", deviceColumns, "device_id"),
      values: [
        device.device_id,
        device.soldier_id,
        device.status,
        minutesFrom(now, -device.heartbeat_minutes_ago),
        device.battery_level,
        device.signal_strength,
        device.location_lat,
        device.location_lon,
      ],
    });
  }

  const fragoColumns = ["frago_id", "unit_id", "task", "assigned_by", "assigned_at", "status", "priority", "deadline"];
  for (const frago of data.fragos) {
    inserts.push({
      table: "fragos",
      sql: insertStatement("fragos", fragoColumns, "frago_id"),
      values: [
        frago.frago_id,
        frago.unit_id,
        frago.task,
        frago.assigned_by,
        minutesFrom(now, -frago.assigned_minutes_ago),
        frago.status,
        frago.priority,
        minutesFrom(now, frago.deadline_in_minutes),
      ],
    });
  }

  const suggestionColumns = [
    "suggestion_id",
    "suggestion_type",
    "status",
    "unit_id",
    "created_at",
    "urgency",
    "reason",
    "confidence",
    "source_reports",
  ];
  for (const suggestion of data.suggestions) {
    inserts.push({
      table: "suggestions",
      sql: insertStatement("suggestions", suggestionColumns, "suggestion_id"),
      values: [
        suggestion.suggestion_id,
        suggestion.suggestion_type,
        suggestion.status,
        suggestion.unit_id,
        now,
        suggestion.urgency,
        suggestion.reason,
        suggestion.confidence,
        JSON.stringify(suggestion.source_reports),
      ],
    });
  }

  return inserts;
}

/** Returns the number of rows actually written; rows already present are skipped. */
export async function insertSampleData(db: Queryable, data: SampleData, now: Date = new Date()): Promise<number> {
  let inserted = 0;
  for (const statement of buildSampleInserts(data, now)) {
    const result = await db.query(statement.sql, statement.values);
    inserted += result.rowCount ?? 0;
  }
  return inserted;
}
