import { describe, expect, it } from "vitest";

import { loadConfigFromEnv } from "../src/config.js";

describe("loadConfigFromEnv", () => {
  it("applies defaults", () => {
    expect(loadConfigFromEnv({})).toEqual({
      logLevel: "info",
      storageDir: null,
      script: { timeoutMs: 10_000, memoryMb: null, model: "gpt-4o-mini" },
      batchAtomicity: "best_effort",
      maxRangeCells: 200_000,
      openaiApiKey: null,
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfigFromEnv({
        TABULA_LOG_LEVEL: "debug",
        TABULA_STORAGE_DIR: " /srv/tabula/files ",
        TABULA_SCRIPT_TIMEOUT_MS: "2500",
        TABULA_SCRIPT_MEMORY_MB: "64",
        TABULA_BATCH_ATOMICITY: "all_or_nothing",
        TABULA_MAX_RANGE_CELLS: "0",
        OPENAI_API_KEY: "test-secret",
        TABULA_SCRIPT_MODEL: "test-model",
      }),
    ).toEqual({
      logLevel: "debug",
      storageDir: "/srv/tabula/files",
      script: { timeoutMs: 2500, memoryMb: 64, model: "test-model" },
      batchAtomicity: "all_or_nothing",
      maxRangeCells: 0,
      openaiApiKey: "test-secret",
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfigFromEnv({ OPENAI_API_KEY: "  ", TABULA_SCRIPT_MEMORY_MB: "" })).toMatchObject({
      openaiApiKey: null,
      script: { memoryMb: null },
    });
  });

  it.each([
    [{ TABULA_SCRIPT_TIMEOUT_MS: "soon" }, /^TABULA_SCRIPT_TIMEOUT_MS must be a non-negative integer/],
    [{ TABULA_SCRIPT_TIMEOUT_MS: "0" }, /^TABULA_SCRIPT_TIMEOUT_MS must be greater than 0/],
    [{ TABULA_SCRIPT_MEMORY_MB: "8" }, /^TABULA_SCRIPT_MEMORY_MB must be at least 16/],
    [{ TABULA_SCRIPT_MEMORY_MB: "-1" }, /^TABULA_SCRIPT_MEMORY_MB must be a non-negative integer/],
    [{ TABULA_BATCH_ATOMICITY: "sometimes" }, /^TABULA_BATCH_ATOMICITY must be/],
    [{ TABULA_LOG_LEVEL: "loud" }, /^TABULA_LOG_LEVEL must be one of/],
  ])("rejects %j", (env, message) => {
    expect(() => loadConfigFromEnv(env)).toThrow(message);
  });
});
