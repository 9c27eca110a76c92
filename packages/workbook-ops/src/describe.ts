import { formatRange } from "./a1.js";
import type { CellValue } from "./types.js";
import type { Workbook } from "./workbook.js";

export interface SheetDescription {
  name: string;
  rows: number;
  columns: number;
  /** A1 range covering every stored cell, or `null` for an empty sheet. */
  used_range: string | null;
  headers: CellValue[];
  sample_rows: CellValue[][];
}

export interface SpreadsheetDescription {
  sheets: SheetDescription[];
}

/**
 * Summarizes a workbook for prompt building: per sheet its extent, the first
 * row as headers and up to `sampleRows` rows after it.
 */
export function describeWorkbook(workbook: Workbook, options: { sampleRows?: number } = {}): SpreadsheetDescription {
  const sampleRows = Math.max(0, options.sampleRows ?? 5);

  return {
    sheets: workbook.listSheets().map((name) => {
      const { rows, cols } = workbook.getSheet(name).dimensions();
      if (rows === 0 || cols === 0) {
        return { name, rows: 0, columns: 0, used_range: null, headers: [], sample_rows: [] };
      }

      const range = { startRow: 0, startCol: 0, endRow: Math.min(rows - 1, sampleRows), endCol: cols - 1 };
      const [headers = [], ...sample] = workbook.getValues(name, range);
      return {
        name,
        rows,
        columns: cols,
        used_range: formatRange({ startRow: 0, startCol: 0, endRow: rows - 1, endCol: cols - 1 }),
        headers,
        sample_rows: sample,
      };
    }),
  };
}
