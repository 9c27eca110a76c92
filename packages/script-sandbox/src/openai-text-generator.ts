import OpenAI from "openai";

import type { TextGenerationResult, TextGenerator } from "./generator.js";

export const DEFAULT_SCRIPT_MODEL = "gpt-4o-mini";

const SYSTEM_PROMPT = "You write short, self-contained JavaScript for a sandboxed data-processing runtime.";

/** The slice of the OpenAI client this generator calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        temperature?: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAITextGeneratorOptions {
  apiKey?: string;
  model?: string;
  /** Injected client, mainly for tests. Built from `apiKey` when absent. */
  client?: ChatCompletionsClient;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;

  constructor(options: OpenAITextGeneratorOptions = {}) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_SCRIPT_MODEL;
  }

  async generate(prompt: string): Promise<TextGenerationResult> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        temperature: 0,
      });
      const text = completion.choices[0]?.message.content ?? "";
      return { success: true, text };
    } catch (error) {
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}
