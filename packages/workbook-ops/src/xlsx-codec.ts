import ExcelJS, { type Cell as ExcelCell, type CellValue as ExcelCellValue } from "exceljs";

import { columnIndexToLabel } from "./a1.js";
import { WorkbookOpsError } from "./errors.js";
import { normalizeStyle, type CellData, type CellStyle, type CellValue, type HorizontalAlign } from "./types.js";
import { Workbook } from "./workbook.js";

// Fixed document properties keep saved output independent of the wall clock.
const DOCUMENT_TIMESTAMP = new Date(Date.UTC(2000, 0, 1));
const DOCUMENT_CREATOR = "tabula";

function textOf(text: unknown): string {
  if (typeof text === "string") return text;
  // Hyperlink cells can carry rich text as their display text.
  if (typeof text === "object" && text !== null && "richText" in text && Array.isArray(text.richText)) {
    return text.richText.map((run: { text?: unknown }) => (typeof run.text === "string" ? run.text : "")).join("");
  }
  return "";
}

function scalarFromExcel(value: ExcelCellValue | undefined): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") return value;
  if (value instanceof Date) return value.toISOString();
  if ("richText" in value) return value.richText.map((run) => run.text).join("");
  if ("hyperlink" in value) return textOf(value.text);
  if ("error" in value) return value.error;
  if ("formula" in value || "sharedFormula" in value) return scalarFromExcel(value.result);
  return null;
}

function isHorizontalAlign(value: unknown): value is HorizontalAlign {
  return value === "left" || value === "center" || value === "right";
}

function styleFromExcel(cell: ExcelCell): CellStyle | undefined {
  const style: CellStyle = {};
  if (cell.font?.bold === true) style.bold = true;

  const fill = cell.fill;
  if (fill && fill.type === "pattern" && fill.pattern === "solid" && fill.fgColor?.argb) {
    style.bg_color = fill.fgColor.argb.toUpperCase();
  }

  if (cell.numFmt && cell.numFmt !== "General") style.number_format = cell.numFmt;

  const horizontal = cell.alignment?.horizontal;
  if (isHorizontalAlign(horizontal)) style.align = horizontal;

  return normalizeStyle(style);
}

function formulaFromExcel(cell: ExcelCell): string | undefined {
  const raw = cell.value;
  if (typeof raw !== "object" || raw === null || raw instanceof Date) return undefined;
  if (!("formula" in raw) && !("sharedFormula" in raw)) return undefined;
  // Shared-formula followers only carry the master's text; `cell.formula` translates it.
  const text = cell.formula || ("formula" in raw && raw.formula ? raw.formula : "");
  return text ? `=${text}` : undefined;
}

function cellFromExcel(cell: ExcelCell): CellData {
  // Cells covered by a merge report the master's value; only the master keeps it.
  const covered = cell.isMerged && cell.master.address !== cell.address;
  const out: CellData = { value: covered ? null : scalarFromExcel(cell.value) };
  const formula = covered ? undefined : formulaFromExcel(cell);
  if (formula) out.formula = formula;
  const style = styleFromExcel(cell);
  if (style) out.style = style;
  return out;
}

/**
 * Reads an `.xlsx` container into the workbook model.
 */
export async function loadWorkbook(bytes: Uint8Array): Promise<Workbook> {
  const excel = new ExcelJS.Workbook();
  try {
    await excel.xlsx.load(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new WorkbookOpsError("CorruptWorkbook", `Unable to read workbook: ${message}`);
  }

  if (excel.worksheets.length === 0) {
    throw new WorkbookOpsError("CorruptWorkbook", "Workbook contains no worksheets");
  }

  const workbook = new Workbook();
  for (const worksheet of excel.worksheets) {
    const sheet = workbook.addSheet(worksheet.name);

    worksheet.eachRow({ includeEmpty: true }, (row, rowNumber) => {
      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        sheet.setCell(rowNumber - 1, colNumber - 1, cellFromExcel(cell));
      });
    });

    const columns = worksheet.columns ?? [];
    columns.forEach((column, index) => {
      if (typeof column.width === "number" && column.width > 0) {
        sheet.setColumnWidth(index, column.width);
      }
    });
  }

  return workbook;
}

function applyStyleToExcel(cell: ExcelCell, style: CellStyle): void {
  if (style.bold !== undefined) cell.font = { bold: style.bold };
  if (style.bg_color !== undefined) {
    cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: style.bg_color } };
  }
  if (style.number_format !== undefined) cell.numFmt = style.number_format;
  if (style.align !== undefined) cell.alignment = { horizontal: style.align };
}

function valueToExcel(cell: CellData): ExcelCellValue {
  if (cell.formula) {
    const formula = cell.formula.startsWith("=") ? cell.formula.slice(1) : cell.formula;
    return cell.value === null ? { formula, date1904: false } : { formula, result: cell.value, date1904: false };
  }
  return cell.value;
}

/**
 * Serializes the model to `.xlsx` bytes. Sheets are written in order and cells
 * in row-major order.
 */
export async function saveWorkbook(workbook: Workbook): Promise<Uint8Array> {
  const excel = new ExcelJS.Workbook();
  excel.creator = DOCUMENT_CREATOR;
  excel.lastModifiedBy = DOCUMENT_CREATOR;
  excel.created = DOCUMENT_TIMESTAMP;
  excel.modified = DOCUMENT_TIMESTAMP;

  for (const name of workbook.listSheets()) {
    const sheet = workbook.getSheet(name);
    const worksheet = excel.addWorksheet(name);

    for (const { col, width } of sheet.columnWidths()) {
      worksheet.getColumn(columnIndexToLabel(col)).width = width;
    }

    for (const { row, col, cell } of sheet.entries()) {
      const target = worksheet.getCell(row + 1, col + 1);
      target.value = valueToExcel(cell);
      if (cell.style) applyStyleToExcel(target, cell.style);
    }
  }

  const buffer = await excel.xlsx.writeBuffer();
  return new Uint8Array(buffer);
}
