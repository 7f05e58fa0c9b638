import { ApiClient } from "../api/client";
import { loadApiConfig, verboseProbeOutput, type ApiConfig } from "../config/api";
import { loadGeminiConfig } from "../config/gemini";
import { GeminiClient } from "../llm/gemini";
import { aiChatProbes } from "../probes/ai_chat";
import { backendConnectionProbes } from "../probes/backend_connection";
import { geminiProbe } from "../probes/gemini";
import { hierarchyProbe } from "../probes/hierarchy";
import { loadSampleReports, populateReportsProbe } from "../probes/populate_reports";
import { runProbes } from "../probes/runner";
import type { Probe, ProbeSummary } from "../probes/types";

export type ProbeCommand = "backend" | "populate" | "ai-chat" | "gemini";

export interface ProbeArgs {
  normalizeReports: boolean;
  verbose: boolean;
}

export function parseProbeArgs(argv: readonly string[]): ProbeArgs {
  const args: ProbeArgs = { normalizeReports: false, verbose: false };

  for (const arg of argv) {
    if (arg === "--normalize") {
      args.normalizeReports = true;
      continue;
    }
    if (arg === "--verbose") {
      args.verbose = true;
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  return args;
}

function clientFor(config: ApiConfig, baseUrl: string = config.baseUrl): ApiClient {
  return new ApiClient({
    baseUrl,
    timeoutMs: config.timeoutMs,
    chatTimeoutMs: config.chatTimeoutMs,
  });
}

export function buildProbes(command: ProbeCommand, args: ProbeArgs, env: NodeJS.ProcessEnv): Probe[] {
  if (command === "gemini") {
    return [geminiProbe(new GeminiClient(loadGeminiConfig(env)))];
  }

  const config = loadApiConfig(env);
  const client = clientFor(config);

  switch (command) {
    case "backend":
      return [
        ...backendConnectionProbes({
          candidates: [config.baseUrl, ...config.fallbackBaseUrls],
          createClient: (baseUrl) => clientFor(config, baseUrl),
        }),
        hierarchyProbe(client),
      ];
    case "populate":
      return [
        {
          name: "backend reachable",
          async run() {
            const hierarchy = await client.getHierarchy();
            return `${config.baseUrl} answered with ${hierarchy.units.length} units`;
          },
        },
        populateReportsProbe({ client, fixtures: loadSampleReports() }),
      ];
    case "ai-chat": {
      const verbose = args.verbose || verboseProbeOutput(env);
      return aiChatProbes(client, {
        normalizeReports: args.normalizeReports,
        onResponse: verbose
          ? (name, response) => console.log(`[probe] ${name} response:\n${JSON.stringify(response, null, 2)}`)
          : undefined,
      });
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Returns the process exit code: 1 when configuration is missing or any probe failed. */
export async function runProbeCommand(
  command: ProbeCommand,
  argv: readonly string[] = [],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const prefix = command === "gemini" ? "[gemini]" : "[probe]";

  let probes: Probe[];
  try {
    probes = buildProbes(command, parseProbeArgs(argv), env);
  } catch (error) {
    console.error(`${prefix} ${errorMessage(error)}`);
    return 1;
  }

  const summary: ProbeSummary = await runProbes(probes);
  return summary.failed > 0 ? 1 : 0;
}
