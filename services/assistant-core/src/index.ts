import { InMemoryFileStore, LocalFileStore, type FileStore } from "@tabula/file-store";
import {
  createSandboxCapabilities,
  OpenAITextGenerator,
  runSpreadsheetScript,
  ScriptGenerator,
  ScriptSandbox,
  type SandboxCapabilities,
  type ScriptRunRequest,
  type ScriptRunResult,
  type SpreadsheetScriptRequest,
  type SpreadsheetScriptResult,
  type TextGenerator,
} from "@tabula/script-sandbox";
import { SpreadsheetService } from "@tabula/workbook-ops";
import type { Logger } from "pino";

import { loadConfigFromEnv, type AssistantConfig } from "./config.js";
import { createLogger } from "./logger.js";

export * from "./config.js";
export * from "./logger.js";

export interface AssistantOptions {
  logger?: Logger;
  fileStore?: FileStore;
  /** Replaces the OpenAI-backed generator. */
  textGenerator?: TextGenerator;
}

export interface Assistant {
  config: AssistantConfig;
  logger: Logger;
  fileStore: FileStore;
  spreadsheets: SpreadsheetService;
  sandbox: ScriptSandbox;
  capabilities: SandboxCapabilities;
  generator: ScriptGenerator;
  runScript(request: ScriptRunRequest): Promise<ScriptRunResult>;
  runSpreadsheetScript(request: SpreadsheetScriptRequest): Promise<SpreadsheetScriptResult>;
}

const unconfiguredGenerator: TextGenerator = {
  async generate() {
    return { success: false, error: "OPENAI_API_KEY is not configured" };
  },
};

function textGeneratorFor(config: AssistantConfig): TextGenerator {
  if (config.openaiApiKey === null) return unconfiguredGenerator;
  return new OpenAITextGenerator({ apiKey: config.openaiApiKey, model: config.script.model });
}

/**
 * Wires the file store, spreadsheet service, sandbox and script generator
 * together from one config.
 */
export function createAssistant(config: AssistantConfig = loadConfigFromEnv(), options: AssistantOptions = {}): Assistant {
  const logger = options.logger ?? createLogger(config.logLevel);
  const fileStore =
    options.fileStore ?? (config.storageDir === null ? new InMemoryFileStore() : new LocalFileStore(config.storageDir));

  const spreadsheets = new SpreadsheetService({
    fileStore,
    atomicity: config.batchAtomicity,
    maxRangeCells: config.maxRangeCells,
    logger: logger.child({ component: "spreadsheets" }),
  });
  const sandbox = new ScriptSandbox({
    timeoutMs: config.script.timeoutMs,
    memoryMb: config.script.memoryMb ?? undefined,
    logger: logger.child({ component: "sandbox" }),
  });
  const capabilities = createSandboxCapabilities({ fileStore, logger: logger.child({ component: "capabilities" }) });
  const generator = new ScriptGenerator(options.textGenerator ?? textGeneratorFor(config), {
    logger: logger.child({ component: "generator" }),
  });

  logger.info(
    {
      storage: config.storageDir === null ? "memory" : "local",
      script_generation: options.textGenerator !== undefined || config.openaiApiKey !== null,
      batch_atomicity: config.batchAtomicity,
    },
    "assistant_core_ready",
  );

  return {
    config,
    logger,
    fileStore,
    spreadsheets,
    sandbox,
    capabilities,
    generator,
    runScript: (request) => sandbox.run(request, capabilities),
    runSpreadsheetScript: (request) =>
      runSpreadsheetScript({ spreadsheets, generator, sandbox, capabilities }, request),
  };
}
