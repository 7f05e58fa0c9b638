import { GEMINI_HELLO_PROMPT, type GeminiClient } from "../llm/gemini";
import type { Probe } from "./types";

export function geminiProbe(client: GeminiClient, prompt: string = GEMINI_HELLO_PROMPT): Probe {
  return {
    name: `gemini ${client.model}`,
    async run() {
      const reply = await client.complete(prompt);
      return reply.trim();
    },
  };
}
