import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";

import { resolveConnectionString } from "../../config/database";

let pool: Pool | null = null;
let poolConnectionString: string | null = null;

export interface Queryable {
  query<T extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Shared pool, opened on first use. Asking for a different connection string
 * while the pool is open is an error; close it first.
 */
export function getPool(connectionString?: string): Pool {
  if (pool) {
    if (connectionString !== undefined && connectionString !== poolConnectionString) {
      throw new Error("Postgres pool is already open with a different connection string");
    }
    return pool;
  }

  const resolved = connectionString ?? resolveConnectionString();
  pool = new Pool({ connectionString: resolved });
  poolConnectionString = resolved;
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }

  const current = pool;
  pool = null;
  poolConnectionString = null;
  await current.end();
}

export function queryableFor(client: PoolClient): Queryable {
  return {
    query: <T extends QueryResultRow>(text: string, values: unknown[] = []) => client.query<T>(text, values),
  };
}

export async function query<T extends QueryResultRow>(text: string, values: unknown[] = []): Promise<QueryResult<T>> {
  return getPool().query<T>(text, values);
}

/**
 * Runs `work` inside BEGIN/COMMIT on a dedicated pooled connection. Any error
 * rolls the transaction back and is re-thrown unchanged.
 */
export async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();

  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      console.error("[postgres] rollback failed", rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
}
