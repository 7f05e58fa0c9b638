import { query, type Queryable } from "./client";
import { toNumber } from "./serializers";

export type SequenceKey = { kind: "report"; reportType: string } | { kind: "frago" };

export const FRAGO_SEQUENCE: SequenceKey = Object.freeze({ kind: "frago" });

const defaultDb: Queryable = { query };

export function normalizeReportType(reportType: string): string {
  const normalized = typeof reportType === "string" ? reportType.trim().toUpperCase() : "";
  if (normalized.length === 0) {
    throw new Error("reportType is required");
  }
  return normalized;
}

export function reportSequence(reportType: string): SequenceKey {
  return { kind: "report", reportType: normalizeReportType(reportType) };
}

export function describeSequenceKey(key: SequenceKey): string {
  return key.kind === "frago" ? "FRAGO stream" : `report type ${key.reportType}`;
}

function readAllocated(rows: Array<{ allocated: string | number }>, key: SequenceKey): number {
  const allocated = toNumber(rows[0]?.allocated);
  if (allocated === null || !Number.isInteger(allocated) || allocated < 1) {
    throw new Error(`Sequence allocation failed for ${describeSequenceKey(key)}`);
  }
  return allocated;
}

/**
 * Allocates the next number for `key` with one INSERT ... ON CONFLICT
 * statement, so concurrent callers never receive the same number. A key
 * without a counter row starts at 1.
 */
export async function nextSequenceNumber(key: SequenceKey, db: Queryable = defaultDb): Promise<number> {
  if (key.kind === "frago") {
    const result = await db.query<{ allocated: string | number }>(
      `
        INSERT INTO frago_sequence (id, next_number)
        VALUES (1, 2)
        ON CONFLICT (id)
        DO UPDATE SET next_number = frago_sequence.next_number + 1
        RETURNING next_number - 1 AS allocated
      `,
    );
    return readAllocated(result.rows, key);
  }

  const reportType = normalizeReportType(key.reportType);
  const result = await db.query<{ allocated: string | number }>(
    `
      INSERT INTO report_sequences (report_type, next_number)
      VALUES ($1, 2)
      ON CONFLICT (report_type)
      DO UPDATE SET next_number = report_sequences.next_number + 1
      RETURNING next_number - 1 AS allocated
    `,
    [reportType],
  );
  return readAllocated(result.rows, key);
}

export async function nextReportNumber(reportType: string, db: Queryable = defaultDb): Promise<number> {
  return nextSequenceNumber(reportSequence(reportType), db);
}

export async function nextFragoNumber(db: Queryable = defaultDb): Promise<number> {
  return nextSequenceNumber(FRAGO_SEQUENCE, db);
}

/** The number the next allocation for `key` would return. Does not allocate. */
export async function peekSequenceNumber(key: SequenceKey, db: Queryable = defaultDb): Promise<number> {
  const result =
    key.kind === "frago"
      ? await db.query<{ next_number: string | number }>("SELECT next_number FROM frago_sequence WHERE id = 1")
      : await db.query<{ next_number: string | number }>(
          "SELECT next_number FROM report_sequences WHERE report_type = $1",
          [normalizeReportType(key.reportType)],
        );

  const next = toNumber(result.rows[0]?.next_number);
  return next === null ? 1 : Math.max(1, Math.round(next));
}
