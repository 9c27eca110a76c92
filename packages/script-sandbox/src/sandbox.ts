import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import { Worker } from "node:worker_threads";

import pino, { type Logger } from "pino";
import { z } from "zod";

import type { SandboxCapabilities } from "./capabilities.js";
import type { ScriptFailure } from "./errors.js";
import { sanitizeScript, type RemovedLine } from "./sanitizer.js";
import { WORKER_SOURCE } from "./worker-source.js";

export const DEFAULT_SCRIPT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_LOG_ENTRIES = 1_000;

export type ScriptLogLevel = "log" | "info" | "warn" | "error" | "debug";

export interface ScriptConsoleEntry {
  level: ScriptLogLevel;
  message: string;
}

export type ScriptRunResult =
  | { success: true; output: unknown; logs: ScriptConsoleEntry[]; removed_lines: RemovedLine[] }
  | { success: false; error: ScriptFailure; logs: ScriptConsoleEntry[]; removed_lines: RemovedLine[] };

export interface ScriptRunRequest {
  script: string;
  /** Exposed to the script as `input_data`. Must be structured-cloneable. */
  input?: unknown;
  timeoutMs?: number;
}

export interface ScriptSandboxOptions {
  timeoutMs?: number;
  /** Heap limit for the worker running the script. Unlimited when unset. */
  memoryMb?: number;
  /** Console entries kept per run; later ones are counted and dropped. */
  maxLogEntries?: number;
  logger?: Logger;
}

interface ConsoleCapture {
  entries: ScriptConsoleEntry[];
  dropped: number;
}

const ScriptFailureSchema = z.object({
  kind: z.enum(["ScriptRuntimeError", "SandboxViolation", "Timeout", "ResourceLimit", "GenerationFailed"]),
  message: z.string(),
  trace: z.string().optional(),
});

const WorkerMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("log"),
    level: z.enum(["log", "info", "warn", "error", "debug"]),
    message: z.string(),
  }),
  z.object({
    type: z.literal("capability_call"),
    id: z.number().int(),
    name: z.string(),
    args: z.array(z.unknown()),
  }),
  z.object({ type: z.literal("done"), output: z.unknown() }),
  z.object({ type: z.literal("failed"), error: ScriptFailureSchema }),
]);

type CapabilityResultMessage =
  | { type: "capability_result"; id: number; ok: true; value: unknown }
  | { type: "capability_result"; id: number; ok: false; error: { name: string; message: string } };

type Outcome = { ok: true; output: unknown } | { ok: false; error: ScriptFailure };

const requireFromHere = createRequire(import.meta.url);
let statisticsSource: Promise<string> | undefined;

function loadStatisticsSource(): Promise<string> {
  if (!statisticsSource) {
    statisticsSource = readFile(requireFromHere.resolve("simple-statistics"), "utf8").catch((error: unknown) => {
      statisticsSource = undefined;
      throw error;
    });
  }
  return statisticsSource;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : "Error";
}

function hasCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error && typeof error.code === "string";
}

/**
 * Maps an error the worker itself died of (as opposed to one the script threw)
 * onto a failure kind.
 */
export function classifyWorkerError(error: unknown): ScriptFailure {
  if (hasCode(error) && error.code === "ERR_WORKER_OUT_OF_MEMORY") {
    return { kind: "ResourceLimit", message: "Script exceeded its memory limit" };
  }
  return {
    kind: "ScriptRuntimeError",
    message: `Script worker crashed: ${errorMessage(error)}`,
    trace: error instanceof Error ? error.stack : undefined,
  };
}

/**
 * Runs untrusted scripts in a worker thread, inside a `node:vm` context that
 * exposes only `input_data`, the capability functions, `ss` and `console`.
 *
 * `run` never throws: every failure is reported in the result.
 */
export class ScriptSandbox {
  private readonly timeoutMs: number;
  private readonly memoryMb: number | undefined;
  private readonly maxLogEntries: number;
  private readonly logger: Logger;

  constructor(options: ScriptSandboxOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;
    this.memoryMb = options.memoryMb;
    this.maxLogEntries = options.maxLogEntries ?? DEFAULT_MAX_LOG_ENTRIES;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  async run(request: ScriptRunRequest, capabilities: SandboxCapabilities = {}): Promise<ScriptRunResult> {
    const { script, removed } = sanitizeScript(request.script);
    if (removed.length > 0) {
      this.logger.warn({ removed }, "script_lines_removed");
    }

    const capture: ConsoleCapture = { entries: [], dropped: 0 };
    const startedAt = Date.now();
    const outcome = await this.execute(script, request, capabilities, capture);
    const logs = capture.entries;
    if (capture.dropped > 0) {
      logs.push({ level: "warn", message: `${capture.dropped} further console entries were dropped` });
    }

    if (outcome.ok) {
      this.logger.info({ duration_ms: Date.now() - startedAt, logs: logs.length }, "script_executed");
      return { success: true, output: outcome.output, logs, removed_lines: removed };
    }

    this.logger.warn(
      { duration_ms: Date.now() - startedAt, kind: outcome.error.kind, message: outcome.error.message },
      "script_failed",
    );
    return { success: false, error: outcome.error, logs, removed_lines: removed };
  }

  private async execute(
    script: string,
    request: ScriptRunRequest,
    capabilities: SandboxCapabilities,
    capture: ConsoleCapture,
  ): Promise<Outcome> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    let statsSource: string;
    try {
      statsSource = await loadStatisticsSource();
    } catch (error) {
      return { ok: false, error: { kind: "ScriptRuntimeError", message: `Unable to load statistics helpers: ${errorMessage(error)}` } };
    }

    let worker: Worker;
    try {
      worker = new Worker(WORKER_SOURCE, {
        eval: true,
        workerData: {
          script,
          input: request.input ?? {},
          capabilityNames: Object.keys(capabilities),
          statsSource,
          timeoutMs,
        },
        resourceLimits: this.memoryMb === undefined ? undefined : { maxOldGenerationSizeMb: this.memoryMb },
      });
    } catch (error) {
      // Typically a DataCloneError for input that can't cross threads.
      return { ok: false, error: { kind: "ScriptRuntimeError", message: `Unable to start script: ${errorMessage(error)}` } };
    }

    return new Promise<Outcome>((resolve) => {
      let settled = false;

      const settle = (outcome: Outcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
        worker.terminate().catch((error: unknown) => {
          this.logger.warn({ err: error }, "script_worker_terminate_failed");
        });
      };

      const timer = setTimeout(() => {
        this.logger.warn({ timeout_ms: timeoutMs }, "script_sandbox_timeout");
        settle({ ok: false, error: { kind: "Timeout", message: `Script execution timed out after ${timeoutMs} ms` } });
      }, timeoutMs);

      const reply = (message: CapabilityResultMessage): void => {
        if (settled) return;
        try {
          worker.postMessage(message);
        } catch (error) {
          // The value could not be cloned; report that to the script instead.
          worker.postMessage({
            type: "capability_result",
            id: message.id,
            ok: false,
            error: { name: "DataCloneError", message: `Capability result could not be transferred: ${errorMessage(error)}` },
          } satisfies CapabilityResultMessage);
        }
      };

      const invoke = (id: number, name: string, args: unknown[]): void => {
        const capability = Object.hasOwn(capabilities, name) ? capabilities[name] : undefined;
        if (!capability) {
          reply({ type: "capability_result", id, ok: false, error: { name: "Error", message: `Unknown capability: ${name}` } });
          return;
        }
        void Promise.resolve()
          .then(() => capability(...args))
          .then(
            (value) => reply({ type: "capability_result", id, ok: true, value }),
            (error: unknown) => {
              this.logger.debug({ capability: name, err: error }, "script_capability_failed");
              reply({
                type: "capability_result",
                id,
                ok: false,
                error: { name: errorName(error), message: errorMessage(error) },
              });
            },
          );
      };

      worker.on("message", (raw: unknown) => {
        const parsed = WorkerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          this.logger.warn({ issues: parsed.error.issues }, "script_worker_message_invalid");
          return;
        }
        const message = parsed.data;
        switch (message.type) {
          case "log":
            if (capture.entries.length < this.maxLogEntries) {
              capture.entries.push({ level: message.level, message: message.message });
            } else {
              capture.dropped += 1;
            }
            this.logger.debug({ level: message.level, message: message.message }, "script_console");
            break;
          case "capability_call":
            invoke(message.id, message.name, message.args);
            break;
          case "done":
            settle({ ok: true, output: message.output });
            break;
          case "failed":
            settle({ ok: false, error: message.error });
            break;
          default: {
            const exhaustive: never = message;
            throw new Error(`Unhandled worker message: ${JSON.stringify(exhaustive)}`);
          }
        }
      });

      worker.on("error", (error: unknown) => {
        settle({ ok: false, error: classifyWorkerError(error) });
      });

      worker.on("exit", (code: number) => {
        settle({ ok: false, error: { kind: "ScriptRuntimeError", message: `Script worker exited with code ${code}` } });
      });
    });
  }
}
