import { z } from "zod";

import {
  backendChatReportSchema,
  frontendChatReportSchema,
  type BackendChatReport,
  type FrontendChatReport,
} from "../schemas/api";

export type ChatReport = BackendChatReport | FrontendChatReport;

export interface ChatNode {
  name: string;
  unit_id: string;
  level?: number | string;
}

export interface ChatRequest {
  message: string;
  context: {
    node: ChatNode;
    reports: ChatReport[];
  };
}

// Payload fields are checked by encodeStructuredJson.
const looseBackendReportSchema = backendChatReportSchema.extend({ structured_json: z.unknown() });
const looseFrontendReportSchema = frontendChatReportSchema.extend({ data: z.unknown() });

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * `structured_json` travels as a JSON string holding an object. Objects are
 * serialized; strings must parse to an object, so double-encoded payloads are
 * rejected.
 */
export function encodeStructuredJson(value: unknown): string {
  if (isPlainObject(value)) {
    return JSON.stringify(value);
  }

  if (typeof value !== "string") {
    throw new Error("structured_json must be an object or a JSON object string");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new Error("structured_json is not valid JSON");
  }

  if (typeof parsed === "string") {
    throw new Error("structured_json is double-encoded");
  }
  if (!isPlainObject(parsed)) {
    throw new Error("structured_json must encode a JSON object");
  }

  return value;
}

/** Converts either accepted report shape into the backend shape. */
export function normalizeChatReport(report: unknown): BackendChatReport {
  const backend = looseBackendReportSchema.safeParse(report);
  if (backend.success) {
    return {
      report_type: backend.data.report_type,
      timestamp: backend.data.timestamp,
      soldier_name: backend.data.soldier_name,
      structured_json: encodeStructuredJson(backend.data.structured_json),
    };
  }

  const frontend = looseFrontendReportSchema.safeParse(report);
  if (frontend.success) {
    return {
      report_type: frontend.data.type,
      timestamp: frontend.data.time,
      soldier_name: frontend.data.from,
      structured_json: encodeStructuredJson(frontend.data.data),
    };
  }

  throw new Error("Unrecognized chat report shape");
}

export function normalizeChatRequest(request: ChatRequest): ChatRequest {
  return {
    message: request.message,
    context: {
      node: request.context.node,
      reports: request.context.reports.map((report) => normalizeChatReport(report)),
    },
  };
}

export function chatRequestBytes(request: ChatRequest): number {
  return Buffer.byteLength(JSON.stringify(request), "utf8");
}
