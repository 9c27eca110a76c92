import pino, { type Logger } from "pino";
import { ZodError } from "zod";

import {
  columnOffsetInRange,
  formatCell,
  formatRange,
  rangeSize,
  resolveCell,
  resolveRange,
  type CellRef,
  type RangeRef,
} from "../a1.js";
import { buildPivot, type PivotRecord } from "../analysis/pivot.js";
import { linearTrend, pearson, summarize, type SummaryResults } from "../analysis/statistics.js";
import { headerKeys, splitHeader } from "../analysis/table.js";
import { BATCH_FATAL_CODES, WorkbookOpsError, type WorkbookOpsErrorCode } from "../errors.js";
import { isNumericCell, parseSpreadsheetNumber } from "../number-parsing.js";
import {
  OPERATION_CAPABILITIES,
  normalizeValidationError,
  validateOperation,
  type CellStyleInput,
  type FilterOperator,
  type Operation,
  type OperationOf,
  type OperationType,
} from "../operation-schema.js";
import { normalizeColor, normalizeFormula, type CellStyle, type CellValue } from "../types.js";
import type { Workbook } from "../workbook.js";

export type BatchAtomicity = "best_effort" | "all_or_nothing";

export const DEFAULT_MAX_RANGE_CELLS = 200_000;

export interface OperationExecutorOptions {
  /**
   * `best_effort` (default) keeps the mutations of successful operations even
   * when others fail. `all_or_nothing` restores the workbook as it was before
   * the batch when any operation fails.
   */
  atomicity?: BatchAtomicity;
  /**
   * Largest number of cells a range operand may span. Operations run
   * synchronously and materialize their ranges, so Excel-scale ranges are
   * rejected up front. `Infinity` or `0` disables the check.
   */
  maxRangeCells?: number;
  logger?: Logger;
}

export interface OperationError {
  error: string;
  code: WorkbookOpsErrorCode;
}

export interface OperationResultByType {
  update_cell: { type: "update_cell"; cell: string; value: CellValue };
  add_row: { type: "add_row"; row: number };
  delete_row: { type: "delete_row"; row_index: number; count: number };
  clear_range: { type: "clear_range"; range: string; cleared_cells: number };
  set_formula: { type: "set_formula"; cell: string; formula: string };
  apply_basic_style: { type: "apply_basic_style"; range: string; styled_cells: number };
  summary_stats: { type: "summary_stats"; range: string; results: SummaryResults };
  filter: { type: "filter"; headers: CellValue[]; filtered_data: CellValue[][]; count: number };
  extract:
    | { type: "extract"; data: Array<Record<string, CellValue>> }
    | { type: "extract"; headers: CellValue[]; data: CellValue[][] };
  correlation: { type: "correlation"; columns: [string, string]; correlation: number | null; sample_size: number };
  trend_analysis: {
    type: "trend_analysis";
    slope: number;
    intercept: number;
    r_squared: number | null;
    sample_size: number;
    next_value_prediction: number;
  };
  pivot: { type: "pivot"; pivot_data: PivotRecord[] };
}

export type OperationPayload = OperationResultByType[OperationType];

export type OperationResult = OperationPayload | OperationError;

export type BatchResults = Record<string, OperationResult>;

export type BatchOutcome =
  | { ok: true; results: BatchResults; mutated: boolean; rolled_back: boolean }
  | { ok: false; error: { code: WorkbookOpsErrorCode; message: string } };

export function isOperationError(result: OperationResult): result is OperationError {
  return "error" in result && "code" in result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts an analysis batch (`{"operations": [...]}`), a modification list
 * (`[...]`) or either one as JSON text.
 */
export function parseBatch(input: unknown): unknown[] {
  let value = input;
  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new WorkbookOpsError("MalformedBatch", `Batch is not valid JSON: ${message}`);
    }
  }

  if (Array.isArray(value)) return value;
  if (isRecord(value) && Array.isArray(value.operations)) return value.operations;
  throw new WorkbookOpsError(
    "MalformedBatch",
    'Batch must be a list of operations or an object with an "operations" list',
  );
}

function operationError(error: unknown): OperationError {
  if (error instanceof WorkbookOpsError) return { error: error.message, code: error.code };
  if (error instanceof ZodError) {
    const normalized = normalizeValidationError(error);
    return { error: normalized.message, code: normalized.code };
  }
  // Anything else is a defect in an operation handler; report it against the
  // operation rather than losing the rest of the batch.
  const message = error instanceof Error ? error.message : String(error);
  return { error: message, code: "InvalidField" };
}

function styleFromInput(input: CellStyleInput): CellStyle {
  const style: CellStyle = {};
  if (input.bold !== undefined) style.bold = input.bold;
  if (input.bg_color !== undefined) style.bg_color = normalizeColor(input.bg_color);
  if (input.number_format !== undefined) style.number_format = input.number_format;
  if (input.align !== undefined) style.align = input.align;
  return style;
}

function matchesCondition(cell: CellValue, operator: FilterOperator, target: CellValue): boolean {
  switch (operator) {
    case ">":
    case ">=":
    case "<":
    case "<=": {
      if (!isNumericCell(cell)) return false;
      const threshold = parseSpreadsheetNumber(target);
      if (threshold === null) {
        throw new WorkbookOpsError("InvalidField", `Filter value for "${operator}" must be numeric`);
      }
      if (operator === ">") return cell > threshold;
      if (operator === ">=") return cell >= threshold;
      if (operator === "<") return cell < threshold;
      return cell <= threshold;
    }
    case "==":
    case "=":
      return cell === target;
    case "!=":
    case "<>":
      return cell !== target;
    case "contains":
      return typeof cell === "string" && target !== null && cell.includes(String(target));
    default: {
      const exhaustive: never = operator;
      throw new Error(`Unhandled filter operator: ${exhaustive}`);
    }
  }
}

/**
 * Applies operations to one workbook, strictly in order. Operation-local
 * failures become error results; batch-fatal failures (`SheetNotFound`) are
 * thrown from `execute` and reported as the outcome of `executeBatch`.
 */
export class OperationExecutor {
  readonly workbook: Workbook;
  private readonly atomicity: BatchAtomicity;
  private readonly maxRangeCells: number;
  private readonly logger: Logger;

  constructor(workbook: Workbook, options: OperationExecutorOptions = {}) {
    this.workbook = workbook;
    this.atomicity = options.atomicity ?? "best_effort";
    this.maxRangeCells = options.maxRangeCells ?? DEFAULT_MAX_RANGE_CELLS;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * Runs a single raw operation. Returns its result, or throws a batch-fatal
   * `WorkbookOpsError`.
   */
  execute(raw: unknown): { result: OperationResult; mutated: boolean } {
    // The sheet is checked before anything else: an unknown sheet aborts the
    // batch even when the rest of the operation is malformed.
    if (isRecord(raw) && typeof raw.sheet === "string") {
      this.workbook.getSheet(raw.sheet);
    }

    let operation: Operation;
    try {
      operation = validateOperation(raw);
    } catch (error) {
      if (error instanceof WorkbookOpsError && BATCH_FATAL_CODES.has(error.code)) throw error;
      return { result: operationError(error), mutated: false };
    }

    try {
      const result = this.executeValidated(operation);
      return { result, mutated: OPERATION_CAPABILITIES[operation.type].mutates_workbook };
    } catch (error) {
      if (error instanceof WorkbookOpsError && BATCH_FATAL_CODES.has(error.code)) throw error;
      this.logger.debug({ operation: operation.type, err: error }, "operation_failed");
      return { result: operationError(error), mutated: false };
    }
  }

  executeBatch(input: unknown): BatchOutcome {
    let operations: unknown[];
    try {
      operations = parseBatch(input);
    } catch (error) {
      if (error instanceof WorkbookOpsError) return { ok: false, error: { code: error.code, message: error.message } };
      throw error;
    }

    const before = this.atomicity === "all_or_nothing" ? this.workbook.clone() : null;
    const results: BatchResults = {};
    let mutated = false;
    let failures = 0;

    for (const [index, raw] of operations.entries()) {
      try {
        const outcome = this.execute(raw);
        results[`operation_${index}`] = outcome.result;
        mutated ||= outcome.mutated;
        if (isOperationError(outcome.result)) failures += 1;
      } catch (error) {
        if (!(error instanceof WorkbookOpsError)) throw error;
        this.logger.warn({ index, code: error.code }, "operation_batch_aborted");
        if (before) this.workbook.restore(before);
        return { ok: false, error: { code: error.code, message: error.message } };
      }
    }

    const rolledBack = before !== null && failures > 0;
    if (before && rolledBack) this.workbook.restore(before);

    this.logger.debug(
      { operations: operations.length, failures, mutated: mutated && !rolledBack, rolled_back: rolledBack },
      "operation_batch_applied",
    );
    return { ok: true, results, mutated: mutated && !rolledBack, rolled_back: rolledBack };
  }

  private executeValidated(operation: Operation): OperationPayload {
    switch (operation.type) {
      case "update_cell":
        return this.updateCell(operation);
      case "add_row":
        return this.addRow(operation);
      case "delete_row":
        return this.deleteRow(operation);
      case "clear_range":
        return this.clearRange(operation);
      case "set_formula":
        return this.setFormula(operation);
      case "apply_basic_style":
        return this.applyBasicStyle(operation);
      case "summary_stats":
        return this.summaryStats(operation);
      case "filter":
        return this.filter(operation);
      case "extract":
        return this.extract(operation);
      case "correlation":
        return this.correlation(operation);
      case "trend_analysis":
        return this.trendAnalysis(operation);
      case "pivot":
        return this.pivot(operation);
      default: {
        const exhaustive: never = operation;
        throw new Error(`Unhandled operation: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /** Sheet named by an address prefix wins over the operation's `sheet`. */
  private sheetFor(operationSheet: string | undefined, addressSheet: string | undefined): string {
    const name = addressSheet ?? operationSheet;
    return name === undefined ? this.workbook.firstSheet().name : this.workbook.getSheet(name).name;
  }

  private cellTarget(operation: { sheet?: string; cell: string }): { sheet: string; cell: CellRef } {
    const resolved = resolveCell(operation.cell);
    return { sheet: this.sheetFor(operation.sheet, resolved.sheet), cell: { row: resolved.row, col: resolved.col } };
  }

  private rangeTarget(operation: { sheet?: string; range: string }): { sheet: string; range: RangeRef } {
    const { sheet, ...range } = resolveRange(operation.range);
    const target = { sheet: this.sheetFor(operation.sheet, sheet), range };
    this.assertRangeWithinLimit(range);
    return target;
  }

  private assertRangeWithinLimit(range: RangeRef): void {
    const limit = this.maxRangeCells;
    if (!Number.isFinite(limit) || limit <= 0) return;
    const { rows, cols } = rangeSize(range);
    const cells = rows * cols;
    if (cells <= limit) return;
    throw new WorkbookOpsError(
      "InvalidField",
      `Range ${formatRange(range)} spans ${cells} cells, which exceeds the limit of ${limit} cells`,
    );
  }

  private updateCell(operation: OperationOf<"update_cell">): OperationResultByType["update_cell"] {
    const { sheet, cell } = this.cellTarget(operation);
    this.workbook.getSheet(sheet).setValue(cell.row, cell.col, operation.value);
    return { type: "update_cell", cell: formatCell(cell), value: operation.value };
  }

  private addRow(operation: OperationOf<"add_row">): OperationResultByType["add_row"] {
    const sheet = this.sheetFor(operation.sheet, undefined);
    const row = this.workbook.appendRow(sheet, operation.values);
    return { type: "add_row", row: row + 1 };
  }

  private deleteRow(operation: OperationOf<"delete_row">): OperationResultByType["delete_row"] {
    if (operation.row_index < 0) {
      throw new WorkbookOpsError("InvalidIndex", `Row index must not be negative, got ${operation.row_index}`);
    }
    const sheet = this.sheetFor(operation.sheet, undefined);
    this.workbook.deleteRows(sheet, operation.row_index, operation.count);
    return { type: "delete_row", row_index: operation.row_index, count: operation.count };
  }

  private clearRange(operation: OperationOf<"clear_range">): OperationResultByType["clear_range"] {
    const { sheet, range } = this.rangeTarget(operation);
    const cleared = this.workbook.clearRange(sheet, range);
    return { type: "clear_range", range: formatRange(range), cleared_cells: cleared };
  }

  private setFormula(operation: OperationOf<"set_formula">): OperationResultByType["set_formula"] {
    const { sheet, cell } = this.cellTarget(operation);
    const formula = normalizeFormula(operation.formula);
    this.workbook.getSheet(sheet).setFormula(cell.row, cell.col, formula);
    return { type: "set_formula", cell: formatCell(cell), formula };
  }

  private applyBasicStyle(operation: OperationOf<"apply_basic_style">): OperationResultByType["apply_basic_style"] {
    const { sheet, range } = this.rangeTarget(operation);
    const styled = this.workbook.applyStyle(sheet, range, styleFromInput(operation.style));
    return { type: "apply_basic_style", range: formatRange(range), styled_cells: styled };
  }

  private summaryStats(operation: OperationOf<"summary_stats">): OperationResultByType["summary_stats"] {
    const { sheet, range } = this.rangeTarget(operation);
    const values = this.workbook.getValues(sheet, range).flat().filter(isNumericCell);
    return { type: "summary_stats", range: formatRange(range), results: summarize(values, operation.metrics) };
  }

  private filter(operation: OperationOf<"filter">): OperationResultByType["filter"] {
    const { sheet, range } = this.rangeTarget(operation);
    const { column, operator, value } = operation.condition;
    const offset = columnOffsetInRange(column, range);
    const { headers, rows } = splitHeader(this.workbook.getValues(sheet, range));
    const filtered = rows.filter((row) => matchesCondition(row[offset] ?? null, operator, value));
    return { type: "filter", headers, filtered_data: filtered, count: filtered.length };
  }

  private extract(operation: OperationOf<"extract">): OperationResultByType["extract"] {
    const { sheet, range } = this.rangeTarget(operation);
    const { headers, rows } = splitHeader(this.workbook.getValues(sheet, range));
    if (operation.format === "rows") {
      return { type: "extract", headers, data: rows };
    }

    const keys = headerKeys(headers, range);
    const data = rows.map((row) => {
      const record: Record<string, CellValue> = {};
      keys.forEach((key, i) => {
        record[key] = row[i] ?? null;
      });
      return record;
    });
    return { type: "extract", data };
  }

  private correlation(operation: OperationOf<"correlation">): OperationResultByType["correlation"] {
    const { sheet, range } = this.rangeTarget(operation);
    const [first = "", second = ""] = operation.columns;
    const firstOffset = columnOffsetInRange(first, range);
    const secondOffset = columnOffsetInRange(second, range);
    const { rows } = splitHeader(this.workbook.getValues(sheet, range));

    const xs: number[] = [];
    const ys: number[] = [];
    for (const row of rows) {
      const x = row[firstOffset] ?? null;
      const y = row[secondOffset] ?? null;
      if (isNumericCell(x) && isNumericCell(y)) {
        xs.push(x);
        ys.push(y);
      }
    }

    if (xs.length === 0) {
      throw new WorkbookOpsError("InsufficientData", "Insufficient numeric data for correlation");
    }

    return {
      type: "correlation",
      columns: [first.trim().toUpperCase(), second.trim().toUpperCase()],
      correlation: pearson(xs, ys),
      sample_size: xs.length,
    };
  }

  private trendAnalysis(operation: OperationOf<"trend_analysis">): OperationResultByType["trend_analysis"] {
    const { sheet, range } = this.rangeTarget(operation);
    const xOffset = columnOffsetInRange(operation.x_column, range);
    const yOffset = columnOffsetInRange(operation.y_column, range);
    const { rows } = splitHeader(this.workbook.getValues(sheet, range));

    const xs: number[] = [];
    const ys: number[] = [];
    for (const row of rows) {
      const y = row[yOffset] ?? null;
      if (!isNumericCell(y)) continue;
      const x = row[xOffset] ?? null;
      // Non-numeric x (dates as text, labels) falls back to its 1-based position.
      xs.push(isNumericCell(x) ? x : xs.length + 1);
      ys.push(y);
    }

    return { type: "trend_analysis", ...linearTrend(xs, ys) };
  }

  private pivot(operation: OperationOf<"pivot">): OperationResultByType["pivot"] {
    const { sheet, range } = this.rangeTarget(operation);
    const { headers, rows } = splitHeader(this.workbook.getValues(sheet, range));
    const offsets = (columns: string[]) => columns.map((column) => columnOffsetInRange(column, range));

    const pivotData = buildPivot({
      rows,
      keys: headerKeys(headers, range),
      rowOffsets: offsets(operation.rows),
      columnOffsets: offsets(operation.columns),
      valueOffsets: offsets(operation.values),
      aggregation: operation.aggregation,
    });
    return { type: "pivot", pivot_data: pivotData };
  }
}

/**
 * Convenience wrapper: applies `input` to `workbook` in place.
 */
export function applyOperations(workbook: Workbook, input: unknown, options: OperationExecutorOptions = {}): BatchOutcome {
  return new OperationExecutor(workbook, options).executeBatch(input);
}
