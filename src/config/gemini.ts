import { ConfigurationError } from "./errors";

export const GEMINI_DEFAULT_MODEL = "gemini-2.5-flash";
export const GEMINI_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai";

export interface GeminiConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export function loadGeminiConfig(env: NodeJS.ProcessEnv = process.env): GeminiConfig {
  const apiKey = (env.GEMINI_API_KEY ?? "").trim();
  if (apiKey.length === 0) {
    throw new ConfigurationError("GEMINI_API_KEY", "Gemini API key is required. Set GEMINI_API_KEY.");
  }

  const model = (env.GEMINI_MODEL ?? "").trim();
  const baseUrl = (env.GEMINI_BASE_URL ?? "").trim().replace(/\/+$/, "");

  return {
    apiKey,
    model: model.length > 0 ? model : GEMINI_DEFAULT_MODEL,
    baseUrl: baseUrl.length > 0 ? baseUrl : GEMINI_DEFAULT_BASE_URL,
  };
}
