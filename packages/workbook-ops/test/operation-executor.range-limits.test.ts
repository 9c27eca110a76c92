import { InMemoryFileStore } from "@tabula/file-store";
import { describe, expect, it } from "vitest";

import { applyOperations, DEFAULT_MAX_RANGE_CELLS } from "../src/executor/operation-executor.js";
import { SpreadsheetService } from "../src/spreadsheet-service.js";
import { workbookWith } from "./helpers.js";

describe("range size limit", () => {
  it("rejects whole-sheet ranges without touching the workbook", () => {
    const workbook = workbookWith([["keep"]]);

    const outcome = applyOperations(workbook, [{ type: "clear_range", range: "A1:XFD1048576" }]);

    expect(DEFAULT_MAX_RANGE_CELLS).toBe(200_000);
    expect(outcome).toEqual({
      ok: true,
      mutated: false,
      rolled_back: false,
      results: {
        operation_0: {
          error: "Range A1:XFD1048576 spans 17179869184 cells, which exceeds the limit of 200000 cells",
          code: "InvalidField",
        },
      },
    });
    expect(workbook.getCell("Sheet1", { row: 0, col: 0 }).value).toBe("keep");
  });

  it("applies the limit to read operations too", () => {
    const workbook = workbookWith([["Amount"], [1], [2]]);

    const outcome = applyOperations(workbook, [{ type: "extract", range: "A1:B3" }], { maxRangeCells: 4 });

    expect(outcome).toMatchObject({
      ok: true,
      results: {
        operation_0: { error: "Range A1:B3 spans 6 cells, which exceeds the limit of 4 cells", code: "InvalidField" },
      },
    });
  });

  it("accepts ranges exactly at the limit", () => {
    const workbook = workbookWith([["a", "b"], [1, 2]]);

    const outcome = applyOperations(workbook, [{ type: "clear_range", range: "A1:B2" }], { maxRangeCells: 4 });

    expect(outcome).toMatchObject({
      ok: true,
      mutated: true,
      results: { operation_0: { type: "clear_range", range: "A1:B2", cleared_cells: 4 } },
    });
  });

  it("skips the check when the limit is zero or not finite", () => {
    for (const maxRangeCells of [0, Number.POSITIVE_INFINITY]) {
      const workbook = workbookWith([["a"]]);
      const outcome = applyOperations(workbook, [{ type: "clear_range", range: "A1:A200001" }], { maxRangeCells });
      expect(outcome).toMatchObject({ ok: true, mutated: true, results: { operation_0: { type: "clear_range" } } });
      expect(workbook.getCell("Sheet1", { row: 0, col: 0 }).value).toBeNull();
    }
  });

  it("is configurable on the spreadsheet service", async () => {
    const service = new SpreadsheetService({ fileStore: new InMemoryFileStore(), maxRangeCells: 2 });
    const handle = await service.createSpreadsheet("limits", { sheets: [{ name: "Data", data: [["x", "y"], [1, 2]] }] });

    const outcome = await service.analyzeSpreadsheet(handle, [{ type: "extract", range: "A1:B2" }]);

    expect(outcome).toMatchObject({
      ok: true,
      results: {
        operation_0: { error: "Range A1:B2 spans 4 cells, which exceeds the limit of 2 cells", code: "InvalidField" },
      },
    });
  });
});
