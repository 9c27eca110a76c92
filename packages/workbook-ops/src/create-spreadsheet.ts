import { z, ZodError } from "zod";

import { columnLabelToIndex, resolveRange } from "./a1.js";
import { WorkbookOpsError } from "./errors.js";
import { CellStyleSchema, normalizeValidationError } from "./operation-schema.js";
import { normalizeColor, type CellStyle } from "./types.js";
import { Workbook } from "./workbook.js";

const CellValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const FormatSpecSchema = CellStyleSchema.extend({
  range: z.string().trim().min(1),
});

const SheetSpecSchema = z.object({
  name: z.string().trim().min(1).optional(),
  data: z.array(z.array(CellValueSchema)).default([]),
  column_widths: z.record(z.number().positive()).default({}),
  formats: z.array(FormatSpecSchema).default([]),
});

export const SpreadsheetSpecSchema = z.object({
  sheets: z.array(SheetSpecSchema).min(1, "at least one sheet is required"),
});

export type SpreadsheetSpec = z.input<typeof SpreadsheetSpecSchema>;

function parseSpec(input: unknown): z.infer<typeof SpreadsheetSpecSchema> {
  let value = input;
  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new WorkbookOpsError("MalformedBatch", `Spreadsheet spec is not valid JSON: ${message}`);
    }
  }

  try {
    return SpreadsheetSpecSchema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) throw normalizeValidationError(error);
    throw error;
  }
}

/**
 * Builds a workbook from a creation spec: sheets with row data, column widths
 * keyed by letter and range formats. Strings starting with `=` become formulas.
 */
export function createWorkbookFromSpec(input: unknown): Workbook {
  const spec = parseSpec(input);
  const workbook = new Workbook();

  spec.sheets.forEach((sheetSpec, index) => {
    const sheet = workbook.addSheet(sheetSpec.name ?? `Sheet${index + 1}`);

    sheetSpec.data.forEach((row, r) => {
      row.forEach((value, c) => sheet.setValue(r, c, value));
    });

    for (const [label, width] of Object.entries(sheetSpec.column_widths)) {
      sheet.setColumnWidth(columnLabelToIndex(label), width);
    }

    for (const { range, ...style } of sheetSpec.formats) {
      const { sheet: _prefix, ...target } = resolveRange(range);
      const patch: CellStyle = { ...style };
      if (style.bg_color !== undefined) patch.bg_color = normalizeColor(style.bg_color);
      workbook.applyStyle(sheet.name, target, patch);
    }
  });

  return workbook;
}

/** Appends `.xlsx` unless the name already ends with it (any case). */
export function ensureXlsxExtension(filename: string): string {
  const trimmed = filename.trim();
  return trimmed.toLowerCase().endsWith(".xlsx") ? trimmed : `${trimmed}.xlsx`;
}
