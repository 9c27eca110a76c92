import ExcelJS from "exceljs";
import { describe, expect, it } from "vitest";

import { WorkbookOpsError } from "../src/errors.js";
import { Workbook } from "../src/workbook.js";
import { loadWorkbook, saveWorkbook } from "../src/xlsx-codec.js";

function sampleWorkbook(): Workbook {
  const workbook = new Workbook(["Data", "Notes"]);
  const data = workbook.getSheet("Data");
  data.setValue(0, 0, "Item");
  data.setValue(0, 1, "Price");
  data.setValue(1, 0, "Widget");
  data.setValue(1, 1, 9.5);
  data.setValue(2, 0, "Gadget");
  data.setValue(2, 1, 12);
  data.setValue(3, 1, "=SUM(B2:B3)");
  data.setValue(4, 0, true);
  data.applyStyle(0, 0, { bold: true, bg_color: "FFFFCC00", align: "center" });
  data.applyStyle(1, 1, { number_format: "0.00" });
  data.setColumnWidth(0, 24);

  workbook.getSheet("Notes").setValue(0, 0, "free text");
  return workbook;
}

async function rejection(promise: Promise<unknown>): Promise<WorkbookOpsError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof WorkbookOpsError) return error;
    throw error;
  }
  throw new Error("Expected promise to reject");
}

describe("xlsx codec", () => {
  it("round-trips values, formulas, styles and column widths", async () => {
    const workbook = sampleWorkbook();
    const loaded = await loadWorkbook(await saveWorkbook(workbook));
    expect(loaded.snapshot()).toEqual(workbook.snapshot());
  });

  it("is stable across repeated load and save cycles", async () => {
    const first = await loadWorkbook(await saveWorkbook(sampleWorkbook()));
    const second = await loadWorkbook(await saveWorkbook(first));
    expect(second.snapshot()).toEqual(first.snapshot());
  });

  it("keeps formulas without a cached result as null values", async () => {
    const loaded = await loadWorkbook(await saveWorkbook(sampleWorkbook()));
    expect(loaded.getCell("Data", { row: 3, col: 1 })).toEqual({ value: null, formula: "=SUM(B2:B3)" });
  });

  it("flattens rich cell values from files written elsewhere", async () => {
    const excel = new ExcelJS.Workbook();
    const worksheet = excel.addWorksheet("Imported");
    worksheet.getCell("A1").value = new Date(Date.UTC(2024, 0, 15));
    worksheet.getCell("A2").value = { richText: [{ text: "Hello " }, { text: "World", font: { bold: true } }] };
    worksheet.getCell("A3").value = { text: "Site", hyperlink: "https://example.com" };
    worksheet.getCell("A4").value = { error: "#DIV/0!" };
    worksheet.getCell("A5").value = { formula: "1+1", result: 2, date1904: false };
    const bytes = new Uint8Array(await excel.xlsx.writeBuffer());

    const workbook = await loadWorkbook(bytes);
    const values = workbook.getValues("Imported", { startRow: 0, startCol: 0, endRow: 4, endCol: 0 });

    expect(values).toEqual([["2024-01-15T00:00:00.000Z"], ["Hello World"], ["Site"], ["#DIV/0!"], [2]]);
    expect(workbook.getCell("Imported", { row: 4, col: 0 }).formula).toBe("=1+1");
  });

  it("loads from a byte view that starts inside a larger buffer", async () => {
    const workbook = sampleWorkbook();
    const bytes = await saveWorkbook(workbook);
    const backing = new Uint8Array(bytes.length + 16);
    backing.set(bytes, 8);
    const view = backing.subarray(8, 8 + bytes.length);

    const loaded = await loadWorkbook(view);
    expect(loaded.snapshot()).toEqual(workbook.snapshot());
  });

  it("rejects bytes that are not a workbook", async () => {
    const error = await rejection(loadWorkbook(new TextEncoder().encode("definitely not a zip file")));
    expect(error.code).toBe("CorruptWorkbook");
    expect(error.message).toMatch(/^Unable to read workbook: /);
  });

  it("rejects truncated workbooks", async () => {
    const bytes = await saveWorkbook(sampleWorkbook());
    const error = await rejection(loadWorkbook(bytes.slice(0, Math.floor(bytes.length / 2))));
    expect(error.code).toBe("CorruptWorkbook");
  });
});
