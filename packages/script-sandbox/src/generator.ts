import pino, { type Logger } from "pino";

import { CAPABILITY_NAMES, CAPABILITY_SIGNATURES } from "./capabilities.js";
import { GenerationFailedError } from "./errors.js";

export type TextGenerationResult = { success: true; text: string } | { success: false; error: string };

/** Anything that turns a prompt into text. */
export interface TextGenerator {
  generate(prompt: string): Promise<TextGenerationResult>;
}

export interface ScriptGenerationRequest {
  task: string;
  inputSchema: unknown;
  outputRequirements: unknown;
}

const FENCED_BLOCK = /```[\w+-]*[^\S\n]*\n([\s\S]*?)```/;
const OPEN_FENCE = /^```[\w+-]*[^\S\n]*\n?/;

/**
 * Returns the code inside the first fenced block, or the trimmed text when
 * there is none. An opening fence without a closing one is dropped.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = FENCED_BLOCK.exec(trimmed);
  if (match) return (match[1] ?? "").trim();
  return trimmed.replace(OPEN_FENCE, "").trim();
}

export function buildScriptPrompt(request: ScriptGenerationRequest): string {
  const helpers = CAPABILITY_NAMES.map((name) => `- ${CAPABILITY_SIGNATURES[name]}`).join("\n");
  return [
    "Return ONLY JavaScript code, without markdown formatting.",
    "",
    `Task: ${request.task}`,
    "",
    "The script runs as the body of an async function. Available globals:",
    "- input_data: the input described below",
    helpers,
    "- ss: simple-statistics (ss.mean, ss.median, ss.standardDeviation, ss.linearRegression, ...)",
    "- console.log / console.warn / console.error",
    "Every helper returns a promise: use await.",
    "",
    `Input schema: ${JSON.stringify(request.inputSchema)}`,
    `Output requirements: ${JSON.stringify(request.outputRequirements)}`,
    "",
    "Rules:",
    "- Assign the result to a variable named output (for example `output = { ... }`).",
    "- On failure assign `output = { error: \"message\" }`.",
    "- Do not use require, import, process, the filesystem or the network. Only the helpers above exist.",
    "- Handle missing or malformed input with a clear error message.",
  ].join("\n");
}

/**
 * Asks a `TextGenerator` for a script that performs a task and returns the
 * bare code.
 */
export class ScriptGenerator {
  private readonly generator: TextGenerator;
  private readonly logger: Logger;

  constructor(generator: TextGenerator, options: { logger?: Logger } = {}) {
    this.generator = generator;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  async generate(request: ScriptGenerationRequest): Promise<string> {
    const result = await this.generator.generate(buildScriptPrompt(request));
    if (!result.success) {
      this.logger.warn({ error: result.error }, "script_generation_failed");
      throw new GenerationFailedError(`Script generation failed: ${result.error}`);
    }

    const script = stripCodeFences(result.text);
    if (script === "") {
      this.logger.warn("script_generation_empty");
      throw new GenerationFailedError("Script generation failed: the generator returned no code");
    }

    this.logger.debug({ length: script.length }, "script_generated");
    return script;
  }
}
