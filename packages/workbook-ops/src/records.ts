import { headerKeys, splitHeader } from "./analysis/table.js";
import type { CellValue } from "./types.js";
import { Workbook } from "./workbook.js";

export type SheetRecord = Record<string, CellValue>;

/** Coerces arbitrary data into something a cell can hold. */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "bigint") return value.toString();
  return JSON.stringify(value) ?? null;
}

/**
 * Reads a sheet as records keyed by its header row. The used area starts at
 * A1 and spans every stored cell.
 */
export function sheetRecords(workbook: Workbook, sheetName: string): SheetRecord[] {
  const { rows, cols } = workbook.getSheet(sheetName).dimensions();
  if (rows === 0 || cols === 0) return [];

  const range = { startRow: 0, startCol: 0, endRow: rows - 1, endCol: cols - 1 };
  const { headers, rows: body } = splitHeader(workbook.getValues(sheetName, range));
  const keys = headerKeys(headers, range);
  return body.map((row) => Object.fromEntries(keys.map((key, i) => [key, row[i] ?? null])));
}

/**
 * Writes records below a header row made of every key, in first-seen order.
 */
export function writeRecords(workbook: Workbook, sheetName: string, records: Array<Record<string, unknown>>): void {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (seen.has(key)) continue;
      seen.add(key);
      keys.push(key);
    }
  }

  const sheet = workbook.hasSheet(sheetName) ? workbook.getSheet(sheetName) : workbook.addSheet(sheetName);
  keys.forEach((key, col) => sheet.setValue(0, col, key));
  records.forEach((record, index) => {
    keys.forEach((key, col) => sheet.setValue(index + 1, col, toCellValue(record[key])));
  });
}

export function workbookFromRecords(sheets: Record<string, Array<Record<string, unknown>>>): Workbook {
  const workbook = new Workbook();
  for (const [name, records] of Object.entries(sheets)) {
    writeRecords(workbook, name, records);
  }
  return workbook;
}
