import type { z } from "zod";

import { API_PATHS, apiUrl, CHAT_TIMEOUT_MS, DEFAULT_TIMEOUT_MS } from "../config/api";
import {
  chatResponseSchema,
  hierarchyResponseSchema,
  rawInputCreatedSchema,
  reportCreatedSchema,
  type ChatResponse,
  type HierarchyResponse,
} from "../schemas/api";
import type { ChatRequest } from "./chat";

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** `flat` posts to /raw_inputs and /reports; `soldier` to /soldiers/{id}/... */
export type SubmissionRoute = "flat" | "soldier";

export interface RawInputPayload {
  soldier_id: string;
  raw_text: string;
  input_type: "voice" | "text";
  confidence: number;
  timestamp: string;
}

export interface ReportPayload {
  soldier_id: string;
  unit_id: string;
  report_type: string;
  structured_json: string;
  confidence: number;
  timestamp: string;
  source_input_id: string | null;
  status: "generated" | "reviewed";
}

export interface SubmissionOptions {
  route?: SubmissionRoute;
}

export interface ApiClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  chatTimeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class ApiRequestError extends Error {
  readonly url: string;
  readonly status: number;
  readonly body: string;

  constructor(url: string, status: number, body: string) {
    const reason = status === 0 ? body : `HTTP ${status}${body.length > 0 ? ` - ${body}` : ""}`;
    super(`Request to ${url} failed: ${reason}`);
    this.name = "ApiRequestError";
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown error";
}

export class ApiClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly chatTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.chatTimeoutMs = options.chatTimeoutMs ?? CHAT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  url(path: string): string {
    return apiUrl(this.baseUrl, path);
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body: unknown,
    timeoutMs: number,
  ): Promise<T> {
    const url = this.url(path);
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            Accept: "application/json",
            "Content-Type": "application/json",
          },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: timeout.signal,
        });
      } catch (error) {
        const reason = timeout.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(error);
        throw new ApiRequestError(url, 0, reason);
      }

      const text = await response.text();
      if (response.status !== 200) {
        throw new ApiRequestError(url, response.status, text);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(text);
      } catch {
        throw new ApiRequestError(url, response.status, "response body is not valid JSON");
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
        throw new ApiRequestError(url, response.status, `unexpected response shape at ${where}`);
      }

      return parsed.data;
    } finally {
      clearTimeout(timer);
    }
  }

  async getHierarchy(): Promise<HierarchyResponse> {
    return this.request("GET", API_PATHS.hierarchy, hierarchyResponseSchema, undefined, this.timeoutMs);
  }

  async createRawInput(payload: RawInputPayload, options: SubmissionOptions = {}): Promise<string> {
    const path =
      options.route === "soldier"
        ? `${API_PATHS.soldiers}/${encodeURIComponent(payload.soldier_id)}/raw_inputs`
        : API_PATHS.rawInputs;
    const created = await this.request("POST", path, rawInputCreatedSchema, payload, this.timeoutMs);
    return created.input_id;
  }

  async createReport(payload: ReportPayload, options: SubmissionOptions = {}): Promise<string> {
    const path =
      options.route === "soldier"
        ? `${API_PATHS.soldiers}/${encodeURIComponent(payload.soldier_id)}/reports`
        : API_PATHS.reports;
    const created = await this.request("POST", path, reportCreatedSchema, payload, this.timeoutMs);
    return created.report_id;
  }

  async aiChat(request: ChatRequest): Promise<ChatResponse> {
    return this.request("POST", API_PATHS.aiChat, chatResponseSchema, request, this.chatTimeoutMs);
  }
}
