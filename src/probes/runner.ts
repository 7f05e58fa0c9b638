import { consoleProbeLogger, type Probe, type ProbeLogger, type ProbeOutcome, type ProbeSummary } from "./types";

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Runs probes one after another; a failing probe is recorded and the run continues. */
export async function runProbes(
  probes: readonly Probe[],
  logger: ProbeLogger = consoleProbeLogger,
  clock: () => number = Date.now,
): Promise<ProbeSummary> {
  const outcomes: ProbeOutcome[] = [];

  for (const probe of probes) {
    logger.info(`[probe] ${probe.name} ...`);
    const startedAt = clock();

    try {
      const detail = await probe.run();
      const outcome = { name: probe.name, ok: true, detail, durationMs: clock() - startedAt };
      outcomes.push(outcome);
      logger.info(`[probe] PASS ${probe.name} (${outcome.durationMs}ms): ${detail}`);
    } catch (error) {
      const outcome = { name: probe.name, ok: false, detail: describeError(error), durationMs: clock() - startedAt };
      outcomes.push(outcome);
      logger.error(`[probe] FAIL ${probe.name} (${outcome.durationMs}ms): ${outcome.detail}`);
    }
  }

  const passed = outcomes.filter((outcome) => outcome.ok).length;
  const failed = outcomes.length - passed;
  logger.info(`[probe] ${passed} passed, ${failed} failed`);

  return { passed, failed, outcomes };
}
