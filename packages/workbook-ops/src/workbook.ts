import { columnIndexToLabel, formatCell, type CellRef, type RangeRef } from "./a1.js";
import { WorkbookOpsError } from "./errors.js";
import {
  cloneCell,
  isCellEmpty,
  mergeStyle,
  normalizeStyle,
  type CellData,
  type CellStyle,
  type CellValue,
} from "./types.js";

export interface CellEntry {
  row: number;
  col: number;
  cell: CellData;
}

export interface CellSnapshot {
  address: string;
  value: CellValue;
  formula?: string;
  style?: CellStyle;
}

export interface SheetSnapshot {
  name: string;
  cells: CellSnapshot[];
  column_widths: Record<string, number>;
}

/**
 * Plain, deterministically ordered view of a workbook. Two workbooks with the
 * same content produce deep-equal snapshots.
 */
export interface WorkbookSnapshot {
  sheets: SheetSnapshot[];
}

const MAX_SHEET_NAME_LENGTH = 31;
const INVALID_SHEET_NAME_CHARS = /[[\]:*?/\\]/;

function cellKey(row: number, col: number): string {
  return `${row}:${col}`;
}

function parseCellKey(key: string): CellRef {
  const [rowRaw, colRaw] = key.split(":");
  return { row: Number(rowRaw), col: Number(colRaw) };
}

export class Sheet {
  readonly name: string;
  private readonly cells = new Map<string, CellData>();
  private readonly widths = new Map<number, number>();

  constructor(name: string) {
    this.name = name;
  }

  clone(): Sheet {
    const next = new Sheet(this.name);
    for (const [key, cell] of this.cells.entries()) {
      next.cells.set(key, cloneCell(cell));
    }
    for (const [col, width] of this.widths.entries()) {
      next.widths.set(col, width);
    }
    return next;
  }

  getCell(row: number, col: number): CellData {
    const cell = this.cells.get(cellKey(row, col));
    return cell ? cloneCell(cell) : { value: null };
  }

  setCell(row: number, col: number, cell: CellData): void {
    const normalized = cloneCell(cell);
    const key = cellKey(row, col);
    if (isCellEmpty(normalized)) {
      this.cells.delete(key);
      return;
    }
    this.cells.set(key, normalized);
  }

  /**
   * Writes a value, keeping the cell's style. A string starting with `=` is
   * stored as a formula.
   */
  setValue(row: number, col: number, value: CellValue): void {
    const current = this.getCell(row, col);
    if (typeof value === "string" && value.startsWith("=")) {
      this.setCell(row, col, { value: null, formula: value, style: current.style });
      return;
    }
    this.setCell(row, col, { value, style: current.style });
  }

  setFormula(row: number, col: number, formula: string): void {
    const current = this.getCell(row, col);
    this.setCell(row, col, { value: null, formula, style: current.style });
  }

  /**
   * Removes value and formula, keeping style. Returns whether anything was removed.
   */
  clearContent(row: number, col: number): boolean {
    const current = this.getCell(row, col);
    if (current.value === null && !current.formula) return false;
    this.setCell(row, col, { value: null, style: current.style });
    return true;
  }

  applyStyle(row: number, col: number, patch: CellStyle): void {
    const current = this.getCell(row, col);
    this.setCell(row, col, { ...current, style: mergeStyle(current.style, patch) });
  }

  /** Non-empty cells in row-major order. */
  entries(): CellEntry[] {
    const entries: CellEntry[] = [];
    for (const [key, cell] of this.cells.entries()) {
      const { row, col } = parseCellKey(key);
      entries.push({ row, col, cell: cloneCell(cell) });
    }
    entries.sort((a, b) => a.row - b.row || a.col - b.col);
    return entries;
  }

  /** Last row holding a value or formula, or -1 for a sheet without data. */
  lastDataRow(): number {
    let maxRow = -1;
    for (const [key, cell] of this.cells.entries()) {
      if (cell.value === null && !cell.formula) continue;
      const { row } = parseCellKey(key);
      if (row > maxRow) maxRow = row;
    }
    return maxRow;
  }

  /** Extent of every stored cell, styled-only cells included. */
  dimensions(): { rows: number; cols: number } {
    let rows = 0;
    let cols = 0;
    for (const key of this.cells.keys()) {
      const { row, col } = parseCellKey(key);
      rows = Math.max(rows, row + 1);
      cols = Math.max(cols, col + 1);
    }
    return { rows, cols };
  }

  deleteRows(startRow: number, count: number): void {
    const moved: Array<[string, CellData]> = [];
    for (const [key, cell] of this.cells.entries()) {
      const { row, col } = parseCellKey(key);
      if (row < startRow) {
        moved.push([key, cell]);
      } else if (row >= startRow + count) {
        moved.push([cellKey(row - count, col), cell]);
      }
    }
    this.cells.clear();
    for (const [key, cell] of moved) this.cells.set(key, cell);
  }

  getColumnWidth(col: number): number | undefined {
    return this.widths.get(col);
  }

  setColumnWidth(col: number, width: number): void {
    if (!Number.isFinite(width) || width <= 0) {
      throw new WorkbookOpsError("InvalidField", `Invalid column width ${width} for column ${columnIndexToLabel(col)}`);
    }
    this.widths.set(col, width);
  }

  columnWidths(): Array<{ col: number; width: number }> {
    return [...this.widths.entries()].map(([col, width]) => ({ col, width })).sort((a, b) => a.col - b.col);
  }

  snapshot(): SheetSnapshot {
    const column_widths: Record<string, number> = {};
    for (const { col, width } of this.columnWidths()) {
      column_widths[columnIndexToLabel(col)] = width;
    }
    return {
      name: this.name,
      cells: this.entries().map(({ row, col, cell }) => {
        const snapshot: CellSnapshot = { address: formatCell({ row, col }), value: cell.value };
        if (cell.formula) snapshot.formula = cell.formula;
        const style = normalizeStyle(cell.style);
        if (style) snapshot.style = style;
        return snapshot;
      }),
      column_widths,
    };
  }
}

export class Workbook {
  private sheets: Sheet[] = [];

  constructor(sheetNames: string[] = []) {
    for (const name of sheetNames) this.addSheet(name);
  }

  listSheets(): string[] {
    return this.sheets.map((sheet) => sheet.name);
  }

  hasSheet(name: string): boolean {
    return this.sheets.some((sheet) => sheet.name === name);
  }

  getSheet(name: string): Sheet {
    const sheet = this.sheets.find((candidate) => candidate.name === name);
    if (!sheet) {
      throw new WorkbookOpsError("SheetNotFound", `Sheet not found: ${name}`, { available: this.listSheets() });
    }
    return sheet;
  }

  firstSheet(): Sheet {
    const [first] = this.sheets;
    if (!first) throw new WorkbookOpsError("SheetNotFound", "Workbook has no sheets");
    return first;
  }

  addSheet(name: string): Sheet {
    const trimmed = name.trim();
    if (!trimmed || trimmed.length > MAX_SHEET_NAME_LENGTH || INVALID_SHEET_NAME_CHARS.test(trimmed)) {
      throw new WorkbookOpsError("InvalidField", `Invalid sheet name: "${name}"`);
    }
    const lower = trimmed.toLowerCase();
    if (this.sheets.some((sheet) => sheet.name.toLowerCase() === lower)) {
      throw new WorkbookOpsError("InvalidField", `Duplicate sheet name: "${name}"`);
    }
    const sheet = new Sheet(trimmed);
    this.sheets.push(sheet);
    return sheet;
  }

  removeSheet(name: string): void {
    const sheet = this.getSheet(name);
    this.sheets = this.sheets.filter((candidate) => candidate !== sheet);
  }

  getCell(sheet: string, ref: CellRef): CellData {
    return this.getSheet(sheet).getCell(ref.row, ref.col);
  }

  setCell(sheet: string, ref: CellRef, cell: CellData): void {
    this.getSheet(sheet).setCell(ref.row, ref.col, cell);
  }

  getRange(sheet: string, range: RangeRef): CellData[][] {
    const target = this.getSheet(sheet);
    const rows: CellData[][] = [];
    for (let r = range.startRow; r <= range.endRow; r++) {
      const row: CellData[] = [];
      for (let c = range.startCol; c <= range.endCol; c++) {
        row.push(target.getCell(r, c));
      }
      rows.push(row);
    }
    return rows;
  }

  getValues(sheet: string, range: RangeRef): CellValue[][] {
    return this.getRange(sheet, range).map((row) => row.map((cell) => cell.value));
  }

  /**
   * Writes a (possibly ragged) block of values with its top-left corner at `start`.
   */
  setRange(sheet: string, start: CellRef, values: CellValue[][]): void {
    const target = this.getSheet(sheet);
    values.forEach((row, r) => {
      row.forEach((value, c) => target.setValue(start.row + r, start.col + c, value));
    });
  }

  /**
   * Writes `values` on the row after the last row holding data and returns
   * that zero-based row index.
   */
  appendRow(sheet: string, values: CellValue[]): number {
    const target = this.getSheet(sheet);
    const row = target.lastDataRow() + 1;
    values.forEach((value, col) => target.setValue(row, col, value));
    return row;
  }

  deleteRows(sheet: string, startRow: number, count = 1): void {
    if (!Number.isInteger(startRow) || startRow < 0) {
      throw new WorkbookOpsError("InvalidIndex", `Row index must be a non-negative integer, got ${startRow}`);
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new WorkbookOpsError("InvalidIndex", `Row count must be a positive integer, got ${count}`);
    }
    this.getSheet(sheet).deleteRows(startRow, count);
  }

  clearRange(sheet: string, range: RangeRef): number {
    const target = this.getSheet(sheet);
    let cleared = 0;
    for (let r = range.startRow; r <= range.endRow; r++) {
      for (let c = range.startCol; c <= range.endCol; c++) {
        if (target.clearContent(r, c)) cleared += 1;
      }
    }
    return cleared;
  }

  applyStyle(sheet: string, range: RangeRef, patch: CellStyle): number {
    const target = this.getSheet(sheet);
    let styled = 0;
    for (let r = range.startRow; r <= range.endRow; r++) {
      for (let c = range.startCol; c <= range.endCol; c++) {
        target.applyStyle(r, c, patch);
        styled += 1;
      }
    }
    return styled;
  }

  clone(): Workbook {
    const next = new Workbook();
    next.sheets = this.sheets.map((sheet) => sheet.clone());
    return next;
  }

  /** Replaces this workbook's content with a copy of `other`. */
  restore(other: Workbook): void {
    this.sheets = other.sheets.map((sheet) => sheet.clone());
  }

  snapshot(): WorkbookSnapshot {
    return { sheets: this.sheets.map((sheet) => sheet.snapshot()) };
  }
}
