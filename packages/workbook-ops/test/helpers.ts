import { WorkbookOpsError } from "../src/errors.js";
import type { CellValue } from "../src/types.js";
import { Workbook } from "../src/workbook.js";

export function workbookWith(rows: CellValue[][], sheetName = "Sheet1"): Workbook {
  const workbook = new Workbook([sheetName]);
  workbook.setRange(sheetName, { row: 0, col: 0 }, rows);
  return workbook;
}

/** Runs `fn` and returns the `code` of the WorkbookOpsError it throws. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof WorkbookOpsError) return error.code;
    throw error;
  }
  return undefined;
}
