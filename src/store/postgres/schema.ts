export type ColumnType = "TEXT" | "TIMESTAMP" | "REAL" | "INTEGER" | "BOOLEAN";

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  primaryKey?: boolean;
  notNull?: boolean;
  defaultSql?: string;
  references?: { table: TableName; column: string };
}

export interface TableDefinition {
  name: TableName;
  columns: ColumnDefinition[];
}

export interface IndexDefinition {
  name: string;
  table: TableName;
  columns: string[];
}

export interface MigrationStep {
  id: string;
  description: string;
  sql: string;
}

export const TABLE_NAMES = [
  "units",
  "soldiers",
  "soldier_raw_inputs",
  "reports",
  "device_status",
  "comm_log",
  "fragos",
  "frago_sequence",
  "suggestions",
  "report_sequences",
] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export const SEEDED_REPORT_SEQUENCE_TYPES = ["CASEVAC", "EOINCREP", "FRAGO", "OPORD"] as const;

const CREATED_AT: ColumnDefinition = { name: "created_at", type: "TIMESTAMP", defaultSql: "CURRENT_TIMESTAMP" };

// Tables are listed parents first; every reference points at an earlier entry.
export const TABLES: readonly TableDefinition[] = [
  {
    name: "units",
    columns: [
      { name: "unit_id", type: "TEXT", primaryKey: true },
      { name: "name", type: "TEXT", notNull: true },
      { name: "parent_unit_id", type: "TEXT", references: { table: "units", column: "unit_id" } },
      { name: "level", type: "TEXT", notNull: true },
      CREATED_AT,
    ],
  },
  {
    name: "soldiers",
    columns: [
      { name: "soldier_id", type: "TEXT", primaryKey: true },
      { name: "name", type: "TEXT", notNull: true },
      { name: "rank", type: "TEXT" },
      { name: "unit_id", type: "TEXT", notNull: true, references: { table: "units", column: "unit_id" } },
      { name: "device_id", type: "TEXT" },
      { name: "status", type: "TEXT", defaultSql: "'active'" },
      CREATED_AT,
      { name: "last_seen", type: "TIMESTAMP" },
    ],
  },
  {
    name: "soldier_raw_inputs",
    columns: [
      { name: "input_id", type: "TEXT", primaryKey: true },
      {
        name: "soldier_id",
        type: "TEXT",
        notNull: true,
        references: { table: "soldiers", column: "soldier_id" },
      },
      { name: "timestamp", type: "TIMESTAMP", notNull: true },
      { name: "raw_text", type: "TEXT", notNull: true },
      { name: "raw_audio_ref", type: "TEXT" },
      { name: "input_type", type: "TEXT", defaultSql: "'voice'" },
      { name: "confidence", type: "REAL", defaultSql: "0.0" },
      { name: "location_ref", type: "TEXT" },
      CREATED_AT,
    ],
  },
  {
    name: "reports",
    columns: [
      { name: "report_id", type: "TEXT", primaryKey: true },
      {
        name: "soldier_id",
        type: "TEXT",
        notNull: true,
        references: { table: "soldiers", column: "soldier_id" },
      },
      { name: "unit_id", type: "TEXT", notNull: true, references: { table: "units", column: "unit_id" } },
      { name: "timestamp", type: "TIMESTAMP", notNull: true },
      { name: "report_type", type: "TEXT", notNull: true },
      { name: "structured_json", type: "TEXT", notNull: true },
      { name: "confidence", type: "REAL", notNull: true },
      CREATED_AT,
      {
        name: "source_input_id",
        type: "TEXT",
        references: { table: "soldier_raw_inputs", column: "input_id" },
      },
      { name: "status", type: "TEXT", defaultSql: "'generated'" },
      { name: "reviewed_by", type: "TEXT" },
      { name: "reviewed_at", type: "TIMESTAMP" },
    ],
  },
  {
    name: "device_status",
    columns: [
      { name: "device_id", type: "TEXT", primaryKey: true },
      { name: "soldier_id", type: "TEXT", references: { table: "soldiers", column: "soldier_id" } },
      { name: "status", type: "TEXT", defaultSql: "'active'" },
      { name: "last_heartbeat", type: "TIMESTAMP" },
      { name: "battery_level", type: "INTEGER" },
      { name: "signal_strength", type: "INTEGER" },
      { name: "location_lat", type: "REAL" },
      { name: "location_lon", type: "REAL" },
      { name: "location_accuracy", type: "REAL" },
      CREATED_AT,
      { name: "updated_at", type: "TIMESTAMP", defaultSql: "CURRENT_TIMESTAMP" },
    ],
  },
  {
    name: "comm_log",
    columns: [
      { name: "log_id", type: "TEXT", primaryKey: true },
      { name: "device_id", type: "TEXT" },
      { name: "soldier_id", type: "TEXT", references: { table: "soldiers", column: "soldier_id" } },
      { name: "topic", type: "TEXT", notNull: true },
      { name: "message_type", type: "TEXT", notNull: true },
      { name: "message_size", type: "INTEGER" },
      { name: "timestamp", type: "TIMESTAMP", notNull: true },
      { name: "success", type: "BOOLEAN", defaultSql: "TRUE" },
      { name: "error_message", type: "TEXT" },
      CREATED_AT,
    ],
  },
  {
    name: "fragos",
    columns: [
      { name: "frago_id", type: "TEXT", primaryKey: true },
      { name: "unit_id", type: "TEXT", notNull: true, references: { table: "units", column: "unit_id" } },
      { name: "task", type: "TEXT" },
      { name: "assigned_by", type: "TEXT" },
      { name: "assigned_at", type: "TIMESTAMP" },
      { name: "status", type: "TEXT", defaultSql: "'pending'" },
      { name: "priority", type: "TEXT", defaultSql: "'medium'" },
      { name: "deadline", type: "TIMESTAMP" },
      CREATED_AT,
      { name: "frago_number", type: "INTEGER" },
      { name: "suggested_fields", type: "TEXT" },
      { name: "final_fields", type: "TEXT" },
      { name: "formatted_document", type: "TEXT" },
      { name: "source_reports", type: "TEXT" },
    ],
  },
  {
    name: "frago_sequence",
    columns: [
      { name: "id", type: "INTEGER", primaryKey: true, defaultSql: "1" },
      { name: "next_number", type: "INTEGER", notNull: true, defaultSql: "1" },
    ],
  },
  {
    name: "suggestions",
    columns: [
      { name: "suggestion_id", type: "TEXT", primaryKey: true },
      { name: "suggestion_type", type: "TEXT", notNull: true },
      { name: "urgency", type: "TEXT", notNull: true, defaultSql: "'MEDIUM'" },
      { name: "reason", type: "TEXT", notNull: true, defaultSql: "'Automated suggestion'" },
      { name: "confidence", type: "REAL", notNull: true, defaultSql: "0.8" },
      { name: "source_reports", type: "TEXT", notNull: true, defaultSql: "'[]'" },
      { name: "status", type: "TEXT", defaultSql: "'pending'" },
      { name: "unit_id", type: "TEXT", references: { table: "units", column: "unit_id" } },
      CREATED_AT,
      { name: "reviewed_at", type: "TIMESTAMP" },
      { name: "reviewed_by", type: "TEXT" },
    ],
  },
  {
    name: "report_sequences",
    columns: [
      { name: "report_type", type: "TEXT", primaryKey: true },
      { name: "next_number", type: "INTEGER", notNull: true, defaultSql: "1" },
    ],
  },
];

export const INDEXES: readonly IndexDefinition[] = [
  { name: "idx_units_parent", table: "units", columns: ["parent_unit_id"] },
  { name: "idx_units_level", table: "units", columns: ["level"] },
  { name: "idx_soldiers_unit", table: "soldiers", columns: ["unit_id"] },
  { name: "idx_soldiers_device", table: "soldiers", columns: ["device_id"] },
  { name: "idx_soldiers_status", table: "soldiers", columns: ["status"] },
  { name: "idx_raw_inputs_soldier", table: "soldier_raw_inputs", columns: ["soldier_id"] },
  { name: "idx_raw_inputs_timestamp", table: "soldier_raw_inputs", columns: ["timestamp"] },
  { name: "idx_reports_soldier", table: "reports", columns: ["soldier_id"] },
  { name: "idx_reports_unit", table: "reports", columns: ["unit_id"] },
  { name: "idx_reports_type", table: "reports", columns: ["report_type"] },
  { name: "idx_reports_timestamp", table: "reports", columns: ["timestamp"] },
  { name: "idx_device_status_soldier", table: "device_status", columns: ["soldier_id"] },
  { name: "idx_comm_log_timestamp", table: "comm_log", columns: ["timestamp"] },
  { name: "idx_fragos_unit", table: "fragos", columns: ["unit_id"] },
  { name: "idx_fragos_status", table: "fragos", columns: ["status"] },
  { name: "idx_fragos_number", table: "fragos", columns: ["frago_number"] },
  { name: "idx_suggestions_unit", table: "suggestions", columns: ["unit_id"] },
  { name: "idx_suggestions_status", table: "suggestions", columns: ["status"] },
  { name: "idx_suggestions_urgency", table: "suggestions", columns: ["urgency"] },
  { name: "idx_suggestions_type", table: "suggestions", columns: ["suggestion_type"] },
];

function renderColumn(column: ColumnDefinition): string {
  const parts = [column.name, column.type];
  if (column.primaryKey) {
    parts.push("PRIMARY KEY");
  }
  if (column.notNull) {
    parts.push("NOT NULL");
  }
  if (column.defaultSql !== undefined) {
    parts.push(`DEFAULT ${column.defaultSql}`);
  }
  return parts.join(" ");
}

export function renderCreateTable(table: TableDefinition): string {
  const lines = table.columns.map((column) => `  ${renderColumn(column)}`);
  for (const column of table.columns) {
    if (column.references) {
      lines.push(`  FOREIGN KEY (${column.name}) REFERENCES ${column.references.table}(${column.references.column})`);
    }
  }

  return `CREATE TABLE IF NOT EXISTS ${table.name} (\n${lines.join(",\n")}\n)`;
}

/**
 * Columns an older deployment can gain without touching existing rows: every
 * non-key column that is nullable or carries a default.
 */
export function addableColumns(table: TableDefinition): ColumnDefinition[] {
  return table.columns.filter(
    (column) => !column.primaryKey && (!column.notNull || column.defaultSql !== undefined),
  );
}

export interface ColumnListing {
  table_name: string;
  column_name: string;
}

/**
 * `table.column` for every defined column absent from `present`, in schema
 * order. Key columns and NOT NULL columns without a default cannot be added
 * to a populated table, so an older deployment missing one shows up here.
 */
export function findMissingColumns(
  present: readonly ColumnListing[],
  tables: readonly TableDefinition[] = TABLES,
): string[] {
  const existing = new Set(present.map((row) => `${row.table_name}.${row.column_name}`));
  const missing: string[] = [];
  for (const table of tables) {
    for (const column of table.columns) {
      const key = `${table.name}.${column.name}`;
      if (!existing.has(key)) {
        missing.push(key);
      }
    }
  }
  return missing;
}

export function renderAddMissingColumns(table: TableDefinition): string | null {
  const columns = addableColumns(table);
  if (columns.length === 0) {
    return null;
  }

  const clauses = columns.map((column) => {
    const reference = column.references
      ? ` REFERENCES ${column.references.table}(${column.references.column})`
      : "";
    return `  ADD COLUMN IF NOT EXISTS ${renderColumn(column)}${reference}`;
  });

  return `ALTER TABLE ${table.name}\n${clauses.join(",\n")}`;
}

export function renderCreateIndex(index: IndexDefinition): string {
  return `CREATE INDEX IF NOT EXISTS ${index.name} ON ${index.table}(${index.columns.join(", ")})`;
}

function renderSequenceSeeds(): MigrationStep[] {
  const reportValues = SEEDED_REPORT_SEQUENCE_TYPES.map((type) => `('${type}', 1)`).join(", ");

  return [
    {
      id: "seed_sequence:frago_sequence",
      description: "Initialize the FRAGO numbering singleton",
      sql: "INSERT INTO frago_sequence (id, next_number) VALUES (1, 1) ON CONFLICT (id) DO NOTHING",
    },
    {
      id: "seed_sequence:report_sequences",
      description: "Initialize report numbering for the standard report types",
      sql: `INSERT INTO report_sequences (report_type, next_number) VALUES ${reportValues} ON CONFLICT (report_type) DO NOTHING`,
    },
  ];
}

export function buildMigrationSteps(): MigrationStep[] {
  const steps: MigrationStep[] = [];

  for (const table of TABLES) {
    steps.push({
      id: `create_table:${table.name}`,
      description: `Create ${table.name} when absent`,
      sql: renderCreateTable(table),
    });

    const alter = renderAddMissingColumns(table);
    if (alter) {
      steps.push({
        id: `add_columns:${table.name}`,
        description: `Add columns missing from older ${table.name} deployments`,
        sql: alter,
      });
    }
  }

  for (const index of INDEXES) {
    steps.push({
      id: `create_index:${index.name}`,
      description: `Index ${index.table}(${index.columns.join(", ")})`,
      sql: renderCreateIndex(index),
    });
  }

  steps.push(...renderSequenceSeeds());
  return steps;
}

export function buildDropSteps(): MigrationStep[] {
  return [...TABLE_NAMES].reverse().map((name) => ({
    id: `drop_table:${name}`,
    description: `Drop ${name} and everything depending on it`,
    sql: `DROP TABLE IF EXISTS ${name} CASCADE`,
  }));
}
