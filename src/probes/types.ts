export interface ProbeLogger {
  info(message: string): void;
  error(message: string): void;
}

export interface Probe {
  name: string;
  /** Resolves with a one-line detail on success; throws on failure. */
  run(): Promise<string>;
}

export interface ProbeOutcome {
  name: string;
  ok: boolean;
  detail: string;
  durationMs: number;
}

export interface ProbeSummary {
  passed: number;
  failed: number;
  outcomes: ProbeOutcome[];
}

export const consoleProbeLogger: ProbeLogger = {
  info: (message) => console.log(message),
  error: (message) => console.error(message),
};
