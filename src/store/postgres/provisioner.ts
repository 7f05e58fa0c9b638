import type { SampleData } from "../../schemas/sample_data";
import { getPool, query, queryableFor, withTransaction, type Queryable } from "./client";
import { insertSampleData, loadSampleData } from "./sample_data";
import { buildDropSteps, buildMigrationSteps, findMissingColumns, type ColumnListing, type MigrationStep } from "./schema";

export type ProvisioningMode = "additive" | "destructive";

export const DESTRUCTIVE_CONFIRMATION = "DROP_ALL_TABLES";
export const COLUMN_CHECK_STEP = "verify_columns";

export interface ProvisionOptions {
  /** Defaults to DATABASE_URL / POSTGRES_URL when no pool is open yet. */
  connectionString?: string;
  includeSampleData?: boolean;
  sampleData?: SampleData;
  now?: Date;
}

export interface DestructiveProvisionOptions extends ProvisionOptions {
  /** Must equal DESTRUCTIVE_CONFIRMATION. */
  confirm: string;
}

export interface ProvisionResult {
  mode: ProvisioningMode;
  stepsApplied: number;
  sampleRowsInserted: number;
  tables: string[];
}

export class ProvisioningError extends Error {
  readonly stepId: string;

  constructor(stepId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Provisioning failed at ${stepId}: ${detail}`, { cause });
    this.name = "ProvisioningError";
    this.stepId = stepId;
  }
}

async function applySteps(db: Queryable, steps: MigrationStep[]): Promise<void> {
  for (const step of steps) {
    try {
      await db.query(step.sql);
    } catch (error) {
      throw new ProvisioningError(step.id, error);
    }
  }
}

async function verifyColumns(db: Queryable): Promise<void> {
  let present: ColumnListing[];
  try {
    const result = await db.query<ColumnListing>(
      "SELECT table_name, column_name FROM information_schema.columns WHERE table_schema = 'public'",
    );
    present = result.rows;
  } catch (error) {
    throw new ProvisioningError(COLUMN_CHECK_STEP, error);
  }

  const missing = findMissingColumns(present);
  if (missing.length > 0) {
    throw new ProvisioningError(
      COLUMN_CHECK_STEP,
      new Error(`columns cannot be added in place: ${missing.join(", ")} (rebuild with db:reset)`),
    );
  }
}

export async function listPublicTables(): Promise<string[]> {
  const result = await query<{ table_name: string }>(
    "SELECT table_name FROM information_schema.tables WHERE table_schema = 'public' ORDER BY table_name",
  );
  return result.rows.map((row) => row.table_name);
}

async function provision(
  mode: ProvisioningMode,
  steps: MigrationStep[],
  options: ProvisionOptions,
): Promise<ProvisionResult> {
  const includeSampleData = options.includeSampleData ?? true;
  const sampleData = includeSampleData ? (options.sampleData ?? loadSampleData()) : null;

  getPool(options.connectionString);
  const applied = await withTransaction(async (client) => {
    const db = queryableFor(client);
    await applySteps(db, steps);
    await verifyColumns(db);

    if (!sampleData) {
      return 0;
    }

    try {
      return await insertSampleData(db, sampleData, options.now ?? new Date());
    } catch (error) {
      throw new ProvisioningError("sample_data", error);
    }
  });

  return {
    mode,
    stepsApplied: steps.length,
    sampleRowsInserted: applied,
    tables: await listPublicTables(),
  };
}

/**
 * Create-if-absent provisioning. Never drops anything, so it is safe to run
 * against a live database as often as needed. Fails, rolling back, when an
 * existing table still lacks a column that cannot be added in place.
 */
export async function provisionSchema(options: ProvisionOptions = {}): Promise<ProvisionResult> {
  return provision("additive", buildMigrationSteps(), options);
}

/**
 * Drops every table and rebuilds the schema in a single transaction. Only for
 * fresh or throwaway environments: all existing rows are lost.
 */
export async function resetAndProvisionSchema(options: DestructiveProvisionOptions): Promise<ProvisionResult> {
  if (options.confirm !== DESTRUCTIVE_CONFIRMATION) {
    throw new Error(`Destructive provisioning requires confirm: "${DESTRUCTIVE_CONFIRMATION}"`);
  }

  return provision("destructive", [...buildDropSteps(), ...buildMigrationSteps()], options);
}
