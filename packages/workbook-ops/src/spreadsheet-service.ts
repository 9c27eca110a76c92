import { normalizeHandle, type FileStore } from "@tabula/file-store";
import pino, { type Logger } from "pino";

import { createWorkbookFromSpec, ensureXlsxExtension } from "./create-spreadsheet.js";
import { describeWorkbook, type SpreadsheetDescription } from "./describe.js";
import { WorkbookOpsError } from "./errors.js";
import { OperationExecutor, type BatchAtomicity, type BatchOutcome } from "./executor/operation-executor.js";
import { HandleLock } from "./handle-lock.js";
import type { Workbook } from "./workbook.js";
import { loadWorkbook, saveWorkbook } from "./xlsx-codec.js";

export interface SpreadsheetServiceOptions {
  fileStore: FileStore;
  atomicity?: BatchAtomicity;
  /** Passed to every batch; see `OperationExecutorOptions.maxRangeCells`. */
  maxRangeCells?: number;
  logger?: Logger;
  /** Share one lock between services that write the same store. */
  lock?: HandleLock;
}

export type ModifyOutcome = BatchOutcome & { handle: string };

/**
 * Load–apply–save cycles over stored workbooks.
 *
 * Work on one handle is serialized inside this process. Nothing coordinates
 * separate processes writing the same handle: the last save wins.
 */
export class SpreadsheetService {
  private readonly fileStore: FileStore;
  private readonly atomicity: BatchAtomicity;
  private readonly maxRangeCells: number | undefined;
  private readonly logger: Logger;
  private readonly lock: HandleLock;

  constructor(options: SpreadsheetServiceOptions) {
    this.fileStore = options.fileStore;
    this.atomicity = options.atomicity ?? "best_effort";
    this.maxRangeCells = options.maxRangeCells;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.lock = options.lock ?? new HandleLock();
  }

  /**
   * Builds a workbook from `spec` and stores it. Returns the new handle.
   */
  async createSpreadsheet(filename: string, spec: unknown): Promise<string> {
    const name = ensureXlsxExtension(filename);
    const workbook = createWorkbookFromSpec(spec);
    return this.serialized(name, async () => {
      const handle = await this.fileStore.upload(name, await saveWorkbook(workbook));
      this.logger.info({ handle, sheets: workbook.listSheets().length }, "spreadsheet_created");
      return handle;
    });
  }

  /**
   * Applies a modification list and saves the workbook back under the same
   * handle when at least one mutation went through.
   */
  async modifySpreadsheet(
    handle: string,
    modifications: unknown,
    options: { atomicity?: BatchAtomicity } = {},
  ): Promise<ModifyOutcome> {
    return this.serialized(handle, async () => {
      const loaded = await this.load(handle);
      if (!loaded.ok) return { ...loaded, handle };

      const executor = new OperationExecutor(loaded.workbook, {
        atomicity: options.atomicity ?? this.atomicity,
        maxRangeCells: this.maxRangeCells,
        logger: this.logger,
      });
      const outcome = executor.executeBatch(modifications);
      if (outcome.ok && outcome.mutated) {
        await this.fileStore.upload(handle, await saveWorkbook(loaded.workbook));
      }

      this.logger.info(
        { handle, ok: outcome.ok, saved: outcome.ok && outcome.mutated },
        "spreadsheet_modified",
      );
      return { ...outcome, handle };
    });
  }

  /**
   * Runs an analysis batch. Results only: the stored file is never rewritten,
   * even when the batch contains mutating operations.
   */
  async analyzeSpreadsheet(handle: string, config: unknown): Promise<BatchOutcome> {
    return this.serialized(handle, async () => {
      const loaded = await this.load(handle);
      if (!loaded.ok) return loaded;

      const outcome = new OperationExecutor(loaded.workbook, {
        maxRangeCells: this.maxRangeCells,
        logger: this.logger,
      }).executeBatch(config);
      this.logger.info({ handle, ok: outcome.ok }, "spreadsheet_analyzed");
      return outcome;
    });
  }

  async describeSpreadsheet(handle: string, options: { sampleRows?: number } = {}): Promise<SpreadsheetDescription> {
    return this.serialized(handle, async () => {
      const loaded = await this.load(handle);
      if (!loaded.ok) {
        throw new WorkbookOpsError(loaded.error.code, loaded.error.message);
      }
      return describeWorkbook(loaded.workbook, options);
    });
  }

  // Spellings of one handle ("a.xlsx", " a.xlsx") share a queue.
  private serialized<T>(handle: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(normalizeHandle(handle), task);
  }

  private async load(
    handle: string,
  ): Promise<{ ok: true; workbook: Workbook } | Extract<BatchOutcome, { ok: false }>> {
    const bytes = await this.fileStore.download(handle);
    try {
      return { ok: true, workbook: await loadWorkbook(bytes) };
    } catch (error) {
      if (!(error instanceof WorkbookOpsError)) throw error;
      this.logger.warn({ handle, code: error.code }, "spreadsheet_load_failed");
      return { ok: false, error: { code: error.code, message: error.message } };
    }
  }
}
