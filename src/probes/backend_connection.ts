import type { ApiClient } from "../api/client";
import type { Probe } from "./types";

export interface BackendConnectionOptions {
  candidates: readonly string[];
  createClient: (baseUrl: string) => ApiClient;
  soldierId?: string;
  unitId?: string;
  now?: () => Date;
}

const CASEVAC_STRUCTURED = {
  casualties: [
    {
      name: "Pvt. Test",
      injury: "Gunshot wound",
      severity: "URGENT",
      status: "Stable",
    },
  ],
  location: "Grid 123456",
  urgency: "URGENT",
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves the first candidate base URL whose /hierarchy answers, then writes a
 * raw input and a CASEVAC report through the soldier-scoped routes.
 */
export function backendConnectionProbes(options: BackendConnectionOptions): Probe[] {
  const soldierId = options.soldierId ?? "ALPHA_01";
  const unitId = options.unitId ?? "PLT_1";
  const now = options.now ?? (() => new Date());

  let active: ApiClient | null = null;
  let inputId: string | null = null;

  function requireActive(): ApiClient {
    if (!active) {
      throw new Error("No reachable backend; skipped");
    }
    return active;
  }

  return [
    {
      name: "backend reachable",
      async run() {
        if (options.candidates.length === 0) {
          throw new Error("No candidate base URLs configured");
        }

        const failures: string[] = [];
        for (const baseUrl of options.candidates) {
          const client = options.createClient(baseUrl);
          try {
            const hierarchy = await client.getHierarchy();
            active = client;
            return `${baseUrl} answered with ${hierarchy.units.length} units`;
          } catch (error) {
            failures.push(describeError(error));
          }
        }

        throw new Error(`No working backend found: ${failures.join("; ")}`);
      },
    },
    {
      name: "create raw input",
      async run() {
        const client = requireActive();
        inputId = await client.createRawInput(
          {
            soldier_id: soldierId,
            raw_text: "CASEVAC request - soldier down with gunshot wound",
            input_type: "voice",
            confidence: 0.95,
            timestamp: now().toISOString(),
          },
          { route: "soldier" },
        );
        return `created raw input ${inputId}`;
      },
    },
    {
      name: "create CASEVAC report",
      async run() {
        const client = requireActive();
        if (inputId === null) {
          throw new Error("No raw input was created; skipped");
        }

        const reportId = await client.createReport(
          {
            soldier_id: soldierId,
            unit_id: unitId,
            report_type: "CASEVAC",
            structured_json: JSON.stringify(CASEVAC_STRUCTURED),
            confidence: 0.9,
            timestamp: now().toISOString(),
            source_input_id: inputId,
            status: "generated",
          },
          { route: "soldier" },
        );
        return `created report ${reportId}; see ${client.url("/reports")}`;
      },
    },
  ];
}
