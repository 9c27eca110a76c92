import { DEFAULT_SCRIPT_MODEL } from "@tabula/script-sandbox";
import { DEFAULT_MAX_RANGE_CELLS, type BatchAtomicity } from "@tabula/workbook-ops";

export type AssistantConfig = {
  logLevel: string;
  /**
   * Root directory of the local file store. `null` keeps files in memory,
   * which only makes sense for tests and demos.
   */
  storageDir: string | null;
  script: {
    timeoutMs: number;
    /** Worker heap limit. `null` leaves the Node default in place. */
    memoryMb: number | null;
    model: string;
  };
  batchAtomicity: BatchAtomicity;
  /** Largest range an operation may address; `0` disables the check. */
  maxRangeCells: number;
  /** Script generation is disabled when unset. */
  openaiApiKey: string | null;
};

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function envString(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

function envInt(name: string, value: string | undefined, defaultValue: number): number {
  const raw = envString(value);
  if (raw === null) return defaultValue;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer (got ${JSON.stringify(value)}).`);
  }
  return Number.parseInt(raw, 10);
}

function envAtomicity(value: string | undefined): BatchAtomicity {
  const raw = envString(value);
  if (raw === null) return "best_effort";
  if (raw === "best_effort" || raw === "all_or_nothing") return raw;
  throw new Error(`TABULA_BATCH_ATOMICITY must be "best_effort" or "all_or_nothing" (got ${JSON.stringify(value)}).`);
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
  const logLevel = envString(env.TABULA_LOG_LEVEL) ?? "info";
  if (!LOG_LEVELS.has(logLevel)) {
    throw new Error(`TABULA_LOG_LEVEL must be one of ${[...LOG_LEVELS].join(", ")} (got ${JSON.stringify(logLevel)}).`);
  }

  const timeoutMs = envInt("TABULA_SCRIPT_TIMEOUT_MS", env.TABULA_SCRIPT_TIMEOUT_MS, 10_000);
  if (timeoutMs === 0) {
    throw new Error("TABULA_SCRIPT_TIMEOUT_MS must be greater than 0.");
  }

  const memoryMb =
    envString(env.TABULA_SCRIPT_MEMORY_MB) === null
      ? null
      : envInt("TABULA_SCRIPT_MEMORY_MB", env.TABULA_SCRIPT_MEMORY_MB, 0);
  if (memoryMb !== null && memoryMb < 16) {
    throw new Error(`TABULA_SCRIPT_MEMORY_MB must be at least 16 (got ${memoryMb}).`);
  }

  return {
    logLevel,
    storageDir: envString(env.TABULA_STORAGE_DIR),
    script: {
      timeoutMs,
      memoryMb,
      model: envString(env.TABULA_SCRIPT_MODEL) ?? DEFAULT_SCRIPT_MODEL,
    },
    batchAtomicity: envAtomicity(env.TABULA_BATCH_ATOMICITY),
    maxRangeCells: envInt("TABULA_MAX_RANGE_CELLS", env.TABULA_MAX_RANGE_CELLS, DEFAULT_MAX_RANGE_CELLS),
    openaiApiKey: envString(env.OPENAI_API_KEY),
  };
}
