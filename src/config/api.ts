import { parseBooleanEnv } from "./database";
import { ConfigurationError } from "./errors";

export const DEFAULT_API_BASE_URL = "http://localhost:8000";
export const DEFAULT_TIMEOUT_MS = 10_000;
export const CHAT_TIMEOUT_MS = 30_000;
const MAX_TIMEOUT_MS = 120_000;

export interface ApiConfig {
  baseUrl: string;
  fallbackBaseUrls: string[];
  timeoutMs: number;
  chatTimeoutMs: number;
}

export const API_PATHS = {
  hierarchy: "/hierarchy",
  soldiers: "/soldiers",
  rawInputs: "/raw_inputs",
  reports: "/reports",
  aiChat: "/ai/chat",
  suggestions: "/api/suggestions",
  casevacSuggest: "/casevac/suggest",
  casevacGenerate: "/casevac/generate",
  eoincrepSuggest: "/eoincrep/suggest",
  eoincrepGenerate: "/eoincrep/generate",
} as const;

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, "");
}

export function apiUrl(baseUrl: string, path: string): string {
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${normalizeBaseUrl(baseUrl)}${normalizedPath}`;
}

function assertHttpUrl(variable: string, value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(variable, `${variable} must be an absolute URL, got "${value}"`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(variable, `${variable} must use http or https`);
  }

  return normalizeBaseUrl(value);
}

function parseTimeout(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = (env[key] ?? "").trim();
  if (raw.length === 0) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(1_000, Math.min(MAX_TIMEOUT_MS, Math.round(parsed)));
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const rawBase = (env.API_BASE_URL ?? "").trim();
  const baseUrl = assertHttpUrl("API_BASE_URL", rawBase.length > 0 ? rawBase : DEFAULT_API_BASE_URL);

  const fallbackBaseUrls = (env.API_FALLBACK_BASE_URLS ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => assertHttpUrl("API_FALLBACK_BASE_URLS", entry))
    .filter((entry) => entry !== baseUrl);

  return {
    baseUrl,
    fallbackBaseUrls: [...new Set(fallbackBaseUrls)],
    timeoutMs: parseTimeout(env, "API_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    chatTimeoutMs: parseTimeout(env, "API_CHAT_TIMEOUT_MS", CHAT_TIMEOUT_MS),
  };
}

export function verboseProbeOutput(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBooleanEnv(env, "PROBE_VERBOSE", false);
}
