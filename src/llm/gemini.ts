import OpenAI from "openai";

import type { GeminiConfig } from "../config/gemini";

export const GEMINI_HELLO_PROMPT = "Say hello in exactly 5 words";

export class GeminiClient {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(config: GeminiConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
    });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
    });

    const content = response.choices[0]?.message?.content ?? "";
    if (content.trim().length === 0) {
      throw new Error(`Gemini model ${this.model} returned an empty completion`);
    }

    return content;
  }
}
