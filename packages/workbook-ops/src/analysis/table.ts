import { columnIndexToLabel, type RangeRef } from "../a1.js";
import type { CellValue } from "../types.js";

export interface Table {
  headers: CellValue[];
  rows: CellValue[][];
}

/** Treats the first row of a block of values as its header row. */
export function splitHeader(values: CellValue[][]): Table {
  const [headers = [], ...rows] = values;
  return { headers, rows };
}

/**
 * Record keys for each column of `range`. Blank header cells fall back to the
 * column letter so every column stays addressable.
 */
export function headerKeys(headers: CellValue[], range: RangeRef): string[] {
  const keys: string[] = [];
  for (let offset = 0; offset <= range.endCol - range.startCol; offset++) {
    const header = headers[offset] ?? null;
    keys.push(header === null || header === "" ? columnIndexToLabel(range.startCol + offset) : String(header));
  }
  return keys;
}
