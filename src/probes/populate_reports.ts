import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import type { ApiClient } from "../api/client";
import { sampleReportsSchema, type SampleReport, type SampleReports, type SampleSoldier } from "../schemas/sample_reports";
import { consoleProbeLogger, type Probe, type ProbeLogger } from "./types";

export const DEFAULT_SAMPLE_REPORTS_PATH = fileURLToPath(new URL("../../data/sample_reports.json", import.meta.url));

export function loadSampleReports(path: string = DEFAULT_SAMPLE_REPORTS_PATH): SampleReports {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  const parsed = sampleReportsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "root";
    throw new Error(`Invalid sample reports in ${path} at ${where}: ${issue?.message ?? "unknown issue"}`);
  }

  return parsed.data;
}

export interface PopulateOptions {
  client: ApiClient;
  fixtures: SampleReports;
  /** Uniform in [0, 1). */
  random?: () => number;
  now?: () => Date;
  logger?: ProbeLogger;
}

export interface PopulateResult {
  attempted: number;
  created: number;
  rawInputFailures: number;
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: () => number, items: readonly T[]): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  const item = items[index];
  if (item === undefined) {
    throw new Error("Cannot pick from an empty list");
  }
  return item;
}

function minutesAgo(now: Date, minutes: number): string {
  return new Date(now.getTime() - minutes * 60_000).toISOString();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function createRawInputFor(
  options: Required<Omit<PopulateOptions, "fixtures">>,
  soldier: SampleSoldier,
  report: SampleReport,
): Promise<string | null> {
  const { client, random, now, logger } = options;
  try {
    return await client.createRawInput({
      soldier_id: soldier.id,
      raw_text: `Report from ${soldier.name}: ${report.report_type} incident`,
      input_type: "voice",
      confidence: Math.round((0.85 + random() * 0.13) * 100) / 100,
      timestamp: minutesAgo(now(), randomInt(random, 5, 60)),
    });
  } catch (error) {
    logger.error(`[probe] raw input for ${soldier.id} failed: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Posts every fixture report for a randomly chosen soldier. Each report gets a
 * raw input first; when that fails the report is still sent without a source.
 */
export async function populateReports(options: PopulateOptions): Promise<PopulateResult> {
  const resolved = {
    client: options.client,
    random: options.random ?? Math.random,
    now: options.now ?? (() => new Date()),
    logger: options.logger ?? consoleProbeLogger,
  };
  const { client, random, now, logger } = resolved;

  const result: PopulateResult = { attempted: 0, created: 0, rawInputFailures: 0 };

  for (const group of options.fixtures.groups) {
    logger.info(`[probe] ${group.label} reports`);

    for (const report of group.reports) {
      result.attempted += 1;
      const soldier = pick(random, options.fixtures.soldiers);
      const sourceInputId = await createRawInputFor(resolved, soldier, report);
      if (sourceInputId === null) {
        result.rawInputFailures += 1;
      }

      try {
        const reportId = await client.createReport({
          soldier_id: soldier.id,
          unit_id: soldier.unit,
          report_type: report.report_type,
          structured_json: JSON.stringify(report.structured_json),
          confidence: report.confidence,
          timestamp: minutesAgo(now(), randomInt(random, 1, 30)),
          source_input_id: sourceInputId,
          status: "generated",
        });
        result.created += 1;
        logger.info(`[probe] created ${report.report_type} report ${reportId} for ${soldier.name}`);
      } catch (error) {
        logger.error(`[probe] ${report.report_type} report for ${soldier.name} failed: ${errorMessage(error)}`);
      }
    }
  }

  return result;
}

export function populateReportsProbe(options: PopulateOptions): Probe {
  return {
    name: "populate reports",
    async run() {
      const result = await populateReports(options);
      const summary = `created ${result.created} of ${result.attempted} reports`;
      if (result.created < result.attempted) {
        throw new Error(summary);
      }
      return summary;
    },
  };
}
