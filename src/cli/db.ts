import { loadDatabaseConfig } from "../config/database";
import {
  auditDatabaseIntegrity,
  checkDatabaseHealth,
  DESTRUCTIVE_CONFIRMATION,
  formatIntegrityReport,
  getPool,
  provisionSchema,
  resetAndProvisionSchema,
  type ProvisionResult,
} from "../store/postgres";

export interface ProvisionArgs {
  includeSampleData: boolean | null;
  confirmDrop: boolean;
  help: boolean;
}

export function parseProvisionArgs(argv: readonly string[], allowDrop = false): ProvisionArgs {
  const args: ProvisionArgs = {
    includeSampleData: null,
    confirmDrop: false,
    help: false,
  };

  for (const arg of argv) {
    if (arg === "--no-sample-data") {
      args.includeSampleData = false;
      continue;
    }

    if (arg === "--sample-data") {
      args.includeSampleData = true;
      continue;
    }

    if (allowDrop && arg === "--yes-drop-everything") {
      args.confirmDrop = true;
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  return args;
}

export function provisionUsage(destructive: boolean): string {
  if (destructive) {
    return [
      "Usage: npm run db:reset -- --yes-drop-everything [--no-sample-data]",
      "  --yes-drop-everything   Required. Drops every table before rebuilding the schema.",
      "  --no-sample-data        Skip inserting the sample units, soldiers and reports.",
    ].join("\n");
  }

  return [
    "Usage: npm run db:provision -- [--no-sample-data]",
    "  --no-sample-data   Skip inserting the sample units, soldiers and reports.",
    "  --sample-data      Insert sample rows even when SEED_SAMPLE_DATA is false.",
  ].join("\n");
}

export function formatProvisionResult(result: ProvisionResult): string {
  return [
    `[provision] ${result.mode} run applied ${result.stepsApplied} steps`,
    `[provision] sample rows inserted: ${result.sampleRowsInserted}`,
    `[provision] tables (${result.tables.length}): ${result.tables.join(", ")}`,
  ].join("\n");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Returns the process exit code. */
export async function runProvision(
  argv: readonly string[],
  options: { destructive: boolean; env?: NodeJS.ProcessEnv },
): Promise<number> {
  let args: ProvisionArgs;
  try {
    args = parseProvisionArgs(argv, options.destructive);
  } catch (error) {
    console.error(`[provision] ${errorMessage(error)}`);
    console.error(provisionUsage(options.destructive));
    return 1;
  }

  if (args.help) {
    console.log(provisionUsage(options.destructive));
    return 0;
  }

  if (options.destructive && !args.confirmDrop) {
    console.error("[provision] refusing to drop tables without --yes-drop-everything");
    return 1;
  }

  try {
    const config = loadDatabaseConfig(options.env ?? process.env);
    const provisionOptions = {
      connectionString: config.connectionString,
      includeSampleData: args.includeSampleData ?? config.includeSampleData,
    };

    console.log(`[provision] starting ${options.destructive ? "destructive" : "additive"} provisioning`);
    const result = options.destructive
      ? await resetAndProvisionSchema({ ...provisionOptions, confirm: DESTRUCTIVE_CONFIRMATION })
      : await provisionSchema(provisionOptions);

    console.log(formatProvisionResult(result));
    return 0;
  } catch (error) {
    console.error(`[provision] ${errorMessage(error)}`);
    return 1;
  }
}

export async function runVerify(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const config = loadDatabaseConfig(env);
    getPool(config.connectionString);
    await checkDatabaseHealth();

    const report = await auditDatabaseIntegrity();
    const output = formatIntegrityReport(report);
    if (report.ok) {
      console.log(`[verify] ${output}`);
      return 0;
    }

    console.error(`[verify] ${output}`);
    return 1;
  } catch (error) {
    console.error(`[verify] ${errorMessage(error)}`);
    return 1;
  }
}
