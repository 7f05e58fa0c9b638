import { chatRequestBytes, normalizeChatRequest, type ChatNode, type ChatRequest } from "../api/chat";
import type { ApiClient } from "../api/client";
import type { ChatResponse } from "../schemas/api";
import type { Probe } from "./types";

const BATTALION: ChatNode = { name: "1st Infantry Battalion", unit_id: "unit-001" };

export interface AiChatCase {
  name: string;
  request: ChatRequest;
}

export const AI_CHAT_CASES: readonly AiChatCase[] = [
  {
    name: "ai chat: minimal request",
    request: {
      message: "What is the current tactical situation?",
      context: { node: BATTALION, reports: [] },
    },
  },
  {
    name: "ai chat: backend report shape",
    request: {
      message: "What threats are we facing?",
      context: {
        node: BATTALION,
        reports: [
          {
            report_type: "CONTACT",
            timestamp: "2025-10-04T22:47:17",
            soldier_name: "Cpl. Smith",
            structured_json: JSON.stringify({
              enemy_count: 15,
              location: "Grid 1234 5678",
              enemy_type: "infantry",
              activity: "patrol movement",
            }),
          },
          {
            report_type: "SITREP",
            timestamp: "2025-10-04T23:15:00",
            soldier_name: "Sgt. Johnson",
            structured_json: JSON.stringify({
              status: "All units operational",
              location: "Forward operating base",
              engagement_status: "No contact",
            }),
          },
        ],
      },
    },
  },
  {
    name: "ai chat: frontend report shape",
    request: {
      message: "What is happening with the 1st Infantry Battalion?",
      context: {
        node: { ...BATTALION, level: 3 },
        reports: [
          {
            type: "CONTACT",
            time: "2025-10-04T22:47:17",
            from: "Cpl. Smith",
            data: {
              enemy_count: 15,
              location: "Grid 1234 5678",
              enemy_type: "infantry",
              activity: "patrol movement",
            },
          },
        ],
      },
    },
  },
];

export interface AiChatProbeOptions {
  /** Convert every report to the backend shape before sending. */
  normalizeReports?: boolean;
  onResponse?: (name: string, response: ChatResponse) => void;
}

export function summarizeChatResponse(response: ChatResponse, maxLength = 200): string {
  const text = response.response.replace(/\s+/g, " ").trim();
  const excerpt = text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
  const analyzed = response.reports_analyzed ?? "n/a";
  return `reports_analyzed=${analyzed}: ${excerpt}`;
}

export function aiChatProbes(client: ApiClient, options: AiChatProbeOptions = {}): Probe[] {
  return AI_CHAT_CASES.map((chatCase) => ({
    name: chatCase.name,
    async run() {
      const request = options.normalizeReports ? normalizeChatRequest(chatCase.request) : chatCase.request;
      const response = await client.aiChat(request);
      options.onResponse?.(chatCase.name, response);
      return `${chatRequestBytes(request)} bytes sent; ${summarizeChatResponse(response)}`;
    },
  }));
}
