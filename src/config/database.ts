import { ConfigurationError } from "./errors";

export interface DatabaseConfig {
  connectionString: string;
  includeSampleData: boolean;
}

function envValue(env: NodeJS.ProcessEnv | undefined, key: string): string {
  if (!env) {
    return "";
  }

  return (env[key] ?? "").trim();
}

export function parseBooleanEnv(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = envValue(env, key).toLowerCase();
  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(raw)) {
    return false;
  }
  return fallback;
}

export function resolveConnectionString(env: NodeJS.ProcessEnv = process.env): string {
  const primary = envValue(env, "DATABASE_URL");
  const fallback = envValue(env, "POSTGRES_URL");
  const connectionString = primary.length > 0 ? primary : fallback;

  if (connectionString.length === 0) {
    throw new ConfigurationError("DATABASE_URL", "DATABASE_URL is required");
  }

  return connectionString;
}

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  return {
    connectionString: resolveConnectionString(env),
    includeSampleData: parseBooleanEnv(env, "SEED_SAMPLE_DATA", true),
  };
}
