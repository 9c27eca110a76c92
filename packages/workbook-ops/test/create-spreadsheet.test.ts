import { describe, expect, it } from "vitest";

import { createWorkbookFromSpec, ensureXlsxExtension } from "../src/create-spreadsheet.js";
import { describeWorkbook } from "../src/describe.js";
import { errorCode } from "./helpers.js";

const REPORT_SPEC = {
  sheets: [
    {
      name: "Data",
      data: [
        ["Item", "Price"],
        ["A", 1.5],
        ["Total", "=SUM(B2:B2)"],
      ],
      column_widths: { A: 20 },
      formats: [{ range: "A1:B1", bold: true, bg_color: "dddddd" }],
    },
    {},
  ],
};

describe("createWorkbookFromSpec", () => {
  it("builds sheets with data, formulas, widths and formats", () => {
    const workbook = createWorkbookFromSpec(REPORT_SPEC);
    const header = { bold: true, bg_color: "FFDDDDDD" };

    expect(workbook.snapshot()).toEqual({
      sheets: [
        {
          name: "Data",
          cells: [
            { address: "A1", value: "Item", style: header },
            { address: "B1", value: "Price", style: header },
            { address: "A2", value: "A" },
            { address: "B2", value: 1.5 },
            { address: "A3", value: "Total" },
            { address: "B3", value: null, formula: "=SUM(B2:B2)" },
          ],
          column_widths: { A: 20 },
        },
        { name: "Sheet2", cells: [], column_widths: {} },
      ],
    });
  });

  it("accepts the spec as JSON text", () => {
    const workbook = createWorkbookFromSpec(JSON.stringify({ sheets: [{ data: [[1]] }] }));
    expect(workbook.listSheets()).toEqual(["Sheet1"]);
    expect(workbook.getCell("Sheet1", { row: 0, col: 0 }).value).toBe(1);
  });

  it("rejects malformed specs", () => {
    expect(errorCode(() => createWorkbookFromSpec("{oops"))).toBe("MalformedBatch");
    expect(errorCode(() => createWorkbookFromSpec({ sheets: [] }))).toBe("InvalidField");
    expect(errorCode(() => createWorkbookFromSpec({}))).toBe("MissingField");
    expect(errorCode(() => createWorkbookFromSpec({ sheets: [{ column_widths: { A: -1 } }] }))).toBe("InvalidField");
  });
});

describe("ensureXlsxExtension", () => {
  it("appends the extension only when missing", () => {
    expect(ensureXlsxExtension(" report ")).toBe("report.xlsx");
    expect(ensureXlsxExtension("report.XLSX")).toBe("report.XLSX");
  });
});

describe("describeWorkbook", () => {
  it("reports extent, headers and sample rows per sheet", () => {
    const workbook = createWorkbookFromSpec(REPORT_SPEC);
    expect(describeWorkbook(workbook, { sampleRows: 1 })).toEqual({
      sheets: [
        {
          name: "Data",
          rows: 3,
          columns: 2,
          used_range: "A1:B3",
          headers: ["Item", "Price"],
          sample_rows: [["A", 1.5]],
        },
        { name: "Sheet2", rows: 0, columns: 0, used_range: null, headers: [], sample_rows: [] },
      ],
    });
  });
});
