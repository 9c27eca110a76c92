import { describe, expect, it } from "vitest";

import { resolveRange } from "../src/a1.js";
import { applyOperations, OperationExecutor, type BatchOutcome } from "../src/executor/operation-executor.js";
import { Workbook } from "../src/workbook.js";
import { workbookWith } from "./helpers.js";

function expectOk(outcome: BatchOutcome): Extract<BatchOutcome, { ok: true }> {
  if (!outcome.ok) throw new Error(`Expected batch to succeed, got ${outcome.error.code}: ${outcome.error.message}`);
  return outcome;
}

function runOne(workbook: Workbook, operation: unknown): unknown {
  return expectOk(applyOperations(workbook, [operation])).results.operation_0;
}

const SALES = [
  ["Region", "Product", "Sales"],
  ["East", "A", 10],
  ["West", "A", 5],
  ["East", "B", 7],
  ["East", "A", 3],
  ["West", "B", "n/a"],
];

describe("mutating operations", () => {
  it("updates exactly one cell", () => {
    const workbook = workbookWith([
      [1, 2],
      [3, 4],
    ]);
    const before = workbook.snapshot().sheets[0]?.cells ?? [];

    const result = runOne(workbook, { type: "update_cell", cell: "B5", value: 42 });

    expect(result).toEqual({ type: "update_cell", cell: "B5", value: 42 });
    expect(workbook.snapshot().sheets[0]?.cells).toEqual([...before, { address: "B5", value: 42 }]);
  });

  it("writes to the sheet named in the address", () => {
    const workbook = new Workbook(["Sheet1", "Other"]);
    runOne(workbook, { type: "update_cell", sheet: "Sheet1", cell: "Other!B2", value: "x" });

    expect(workbook.getCell("Other", { row: 1, col: 1 }).value).toBe("x");
    expect(workbook.getCell("Sheet1", { row: 1, col: 1 }).value).toBeNull();
  });

  it("deletes rows by zero-based index", () => {
    const workbook = workbookWith([["a"], ["b"], ["c"]]);
    const result = runOne(workbook, { type: "delete_row", rowIndex: 0 });

    expect(result).toEqual({ type: "delete_row", row_index: 0, count: 1 });
    expect(workbook.getValues("Sheet1", resolveRange("A1:A3"))).toEqual([["b"], ["c"], [null]]);
  });

  it("rejects negative row indices without touching the sheet", () => {
    const workbook = workbookWith([["a"], ["b"]]);
    const result = runOne(workbook, { type: "delete_row", row_index: -1 });

    expect(result).toEqual({ error: "Row index must not be negative, got -1", code: "InvalidIndex" });
    expect(workbook.getValues("Sheet1", resolveRange("A1:A2"))).toEqual([["a"], ["b"]]);
  });

  it("appends rows and reports their 1-based row number", () => {
    const workbook = workbookWith([
      ["Name", "Amount"],
      ["a", 1],
    ]);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "add_row", values: ["b", 2] },
        { type: "apply_basic_style", range: "A3:B3", style: { bold: true } },
      ]),
    );

    expect(outcome.results.operation_0).toEqual({ type: "add_row", row: 3 });
    expect(workbook.getCell("Sheet1", { row: 2, col: 0 })).toEqual({ value: "b", style: { bold: true } });
  });

  it("clears a range and counts cleared cells", () => {
    const workbook = workbookWith([
      [1, 2],
      [3, null],
    ]);
    const result = runOne(workbook, { type: "clear_range", target: "A1:B2" });

    expect(result).toEqual({ type: "clear_range", range: "A1:B2", cleared_cells: 3 });
    expect(workbook.getSheet("Sheet1").entries()).toEqual([]);
  });

  it("adds the leading = to formulas", () => {
    const workbook = workbookWith([[1, 2]]);
    const result = runOne(workbook, { type: "set_formula", cell: "C1", formula: "SUM(A1:B1)" });

    expect(result).toEqual({ type: "set_formula", cell: "C1", formula: "=SUM(A1:B1)" });
    expect(workbook.getCell("Sheet1", { row: 0, col: 2 })).toEqual({ value: null, formula: "=SUM(A1:B1)" });
  });
});

describe("apply_basic_style", () => {
  it("merges style into existing formatting and normalizes colors", () => {
    const workbook = workbookWith([["a", "b"]]);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "apply_basic_style", range: "A1:B1", style: { bold: true } },
        { type: "apply_basic_style", range: "A1:B1", style: { bg_color: "ffcc00" } },
      ]),
    );

    expect(outcome.results.operation_1).toEqual({ type: "apply_basic_style", range: "A1:B1", styled_cells: 2 });
    expect(workbook.getCell("Sheet1", { row: 0, col: 0 })).toEqual({
      value: "a",
      style: { bold: true, bg_color: "FFFFCC00" },
    });
  });

  it("accepts the format alias with flat style fields", () => {
    const workbook = workbookWith([["a"]]);
    runOne(workbook, { type: "format", range: "A1", bold: true, bgColor: "#00FF00", align: "right" });

    expect(workbook.getCell("Sheet1", { row: 0, col: 0 }).style).toEqual({
      bold: true,
      bg_color: "FF00FF00",
      align: "right",
    });
  });

  it("reports invalid colors", () => {
    const workbook = workbookWith([["a"]]);
    const result = runOne(workbook, { type: "format", target: "A1", bg_color: "red" });

    expect(result).toEqual({ error: 'Invalid color "red": expected 6 or 8 hex digits', code: "InvalidField" });
    expect(workbook.getCell("Sheet1", { row: 0, col: 0 })).toEqual({ value: "a" });
  });
});

describe("read operations", () => {
  const people = [
    ["Name", "Amount"],
    ["Alice", 10],
    ["Bob", 20],
    ["Alicia", 30],
  ];

  it("filters numerically and skips non-numeric cells", () => {
    const workbook = workbookWith([["Amount"], [50], [150], ["text"], [200]]);
    const result = runOne(workbook, {
      type: "filter",
      range: "A1:A5",
      condition: { column: "A", operator: ">", value: 100 },
    });

    expect(result).toEqual({ type: "filter", headers: ["Amount"], filtered_data: [[150], [200]], count: 2 });
  });

  it("parses numeric filter thresholds given as text", () => {
    const workbook = workbookWith(people);
    const result = runOne(workbook, { type: "filter", range: "A1:B4", column: "B", operator: ">=", value: "20" });

    expect(result).toEqual({
      type: "filter",
      headers: ["Name", "Amount"],
      filtered_data: [
        ["Bob", 20],
        ["Alicia", 30],
      ],
      count: 2,
    });
  });

  it("keeps the sign of negative thresholds written in parentheses", () => {
    const workbook = workbookWith([["Delta"], [-3], [3]]);
    const result = runOne(workbook, { type: "filter", range: "A1:A3", column: "A", operator: ">", value: "(-5)" });

    expect(result).toEqual({ type: "filter", headers: ["Delta"], filtered_data: [[-3], [3]], count: 2 });
  });

  it("supports contains and strict equality", () => {
    const workbook = workbookWith(people);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "filter", range: "A1:B4", condition: { column: "A", operator: "contains", value: "Ali" } },
        { type: "filter", range: "A1:B4", condition: { column: "B", operator: "==", value: 20 } },
        { type: "filter", range: "A1:B4", condition: { column: "B", operator: "==", value: "20" } },
      ]),
    );

    expect(outcome.results.operation_0).toMatchObject({ filtered_data: [["Alice", 10], ["Alicia", 30]], count: 2 });
    expect(outcome.results.operation_1).toMatchObject({ filtered_data: [["Bob", 20]], count: 1 });
    expect(outcome.results.operation_2).toMatchObject({ filtered_data: [], count: 0 });
    expect(outcome.mutated).toBe(false);
  });

  it("resolves filter columns relative to the range", () => {
    const workbook = workbookWith([
      ["id", "Name", "Amount"],
      [1, "Alice", 10],
      [2, "Bob", 20],
    ]);
    const result = runOne(workbook, { type: "filter", range: "B1:C3", column: "C", operator: ">", value: 15 });

    expect(result).toMatchObject({ headers: ["Name", "Amount"], filtered_data: [["Bob", 20]] });
  });

  it("rejects filter columns outside the range", () => {
    const workbook = workbookWith(people);
    const result = runOne(workbook, { type: "filter", range: "A1:B4", column: "D", operator: ">", value: 1 });
    expect(result).toMatchObject({ code: "InvalidAddress" });
  });

  it("extracts records keyed by header", () => {
    const workbook = workbookWith(people);
    expect(runOne(workbook, { type: "extract", range: "A1:B3" })).toEqual({
      type: "extract",
      data: [
        { Name: "Alice", Amount: 10 },
        { Name: "Bob", Amount: 20 },
      ],
    });
  });

  it("extracts plain rows", () => {
    const workbook = workbookWith(people);
    expect(runOne(workbook, { type: "extract", range: "A1:B3", format: "rows" })).toEqual({
      type: "extract",
      headers: ["Name", "Amount"],
      data: [
        ["Alice", 10],
        ["Bob", 20],
      ],
    });
  });

  it("keys blank headers by column letter", () => {
    const workbook = workbookWith([
      [null, "x"],
      [1, 2],
    ]);
    expect(runOne(workbook, { type: "extract", range: "A1:B2" })).toEqual({
      type: "extract",
      data: [{ A: 1, x: 2 }],
    });
  });
});

describe("analysis operations", () => {
  it("summarizes numeric cells only", () => {
    const workbook = workbookWith([["Score"], [4], [1], ["n/a"], [3], [2]]);
    const result = runOne(workbook, {
      type: "summary_stats",
      range: "A1:A6",
      metrics: ["mean", "median", "sum", "min", "max", "count"],
    });

    expect(result).toEqual({
      type: "summary_stats",
      range: "A1:A6",
      results: { mean: 2.5, median: 2.5, sum: 10, min: 1, max: 4, count: 4 },
    });
  });

  it("defaults to mean and sum, and reports only count for empty ranges", () => {
    const workbook = workbookWith([["Score"], [4], [1], ["n/a"], [3], [2]]);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "aggregate", range: "A1:A6" },
        { type: "summary_stats", range: "C1:C3", metrics: ["mean", "count"] },
      ]),
    );

    expect(outcome.results.operation_0).toEqual({ type: "summary_stats", range: "A1:A6", results: { mean: 2.5, sum: 10 } });
    expect(outcome.results.operation_1).toEqual({ type: "summary_stats", range: "C1:C3", results: { count: 0 } });
  });

  it("correlates two columns", () => {
    const workbook = workbookWith([
      ["X", "Y", "Flat"],
      [1, 2, 5],
      [2, 4, 5],
      [3, 6, 5],
    ]);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "correlation", range: "A1:C4", columns: ["a", "b"] },
        { type: "correlation", range: "A1:C4", columns: ["A", "C"] },
      ]),
    );

    expect(outcome.results.operation_0).toEqual({
      type: "correlation",
      columns: ["A", "B"],
      correlation: 1,
      sample_size: 3,
    });
    expect(outcome.results.operation_1).toEqual({
      type: "correlation",
      columns: ["A", "C"],
      correlation: null,
      sample_size: 3,
    });
  });

  it("requires numeric pairs and exactly two columns for correlation", () => {
    const workbook = workbookWith([
      ["X", "Y"],
      ["a", "b"],
    ]);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "correlation", range: "A1:B2", columns: ["A", "B"] },
        { type: "correlation", range: "A1:B2", columns: ["A"] },
      ]),
    );

    expect(outcome.results.operation_0).toEqual({
      error: "Insufficient numeric data for correlation",
      code: "InsufficientData",
    });
    expect(outcome.results.operation_1).toMatchObject({ code: "InvalidField" });
  });

  it("fits a trend over numeric x values", () => {
    const workbook = workbookWith([
      ["Week", "Sales"],
      [1, 2],
      [2, 4],
      [3, 6],
      [4, 8],
    ]);
    expect(runOne(workbook, { type: "trend_analysis", range: "A1:B5", xColumn: "A", yColumn: "B" })).toEqual({
      type: "trend_analysis",
      slope: 2,
      intercept: 0,
      r_squared: 1,
      sample_size: 4,
      next_value_prediction: 10,
    });
  });

  it("uses row position for non-numeric x values", () => {
    const workbook = workbookWith([
      ["Month", "Sales"],
      ["Jan", 10],
      ["Feb", 20],
      ["Mar", 30],
    ]);
    expect(runOne(workbook, { type: "trend_analysis", range: "A1:B4", x_column: "A", y_column: "B" })).toEqual({
      type: "trend_analysis",
      slope: 10,
      intercept: 0,
      r_squared: 1,
      sample_size: 3,
      next_value_prediction: 40,
    });
  });

  it("reports insufficient data when x has no spread", () => {
    const workbook = workbookWith([
      ["X", "Y"],
      [2, 1],
      [2, 3],
    ]);
    expect(runOne(workbook, { type: "trend_analysis", range: "A1:B3", x_column: "A", y_column: "B" })).toEqual({
      error: "Trend analysis requires at least two distinct x values",
      code: "InsufficientData",
    });
  });

  it("pivots with column groups", () => {
    const workbook = workbookWith(SALES);
    expect(
      runOne(workbook, { type: "pivot", source_data: "A1:C6", rows: ["A"], columns: ["B"], values: ["C"] }),
    ).toEqual({
      type: "pivot",
      pivot_data: [
        { Region: "East", A: 13, B: 7 },
        { Region: "West", A: 5, B: null },
      ],
    });
  });

  it("pivots into a single Value group without column keys", () => {
    const workbook = workbookWith(SALES);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "pivot", range: "A1:C6", rows: ["A"], values: ["C"] },
        { type: "pivot", range: "A1:C6", rows: ["A"], values: ["C"], aggregation: "count" },
        { type: "pivot", range: "A1:C6", rows: ["A"], columns: ["B"], values: ["C"], aggregation: "mean" },
      ]),
    );

    expect(outcome.results.operation_0).toEqual({
      type: "pivot",
      pivot_data: [
        { Region: "East", Value: 20 },
        { Region: "West", Value: 5 },
      ],
    });
    expect(outcome.results.operation_1).toEqual({
      type: "pivot",
      pivot_data: [
        { Region: "East", Value: 3 },
        { Region: "West", Value: 1 },
      ],
    });
    expect(outcome.results.operation_2).toEqual({
      type: "pivot",
      pivot_data: [
        { Region: "East", A: 6.5, B: 7 },
        { Region: "West", A: 5, B: null },
      ],
    });
  });

  it("prefixes group names with the value header for several value columns", () => {
    const workbook = workbookWith([
      ["Region", "Sales", "Units"],
      ["East", 10, 1],
      ["West", 5, 2],
      ["East", 3, 4],
    ]);
    expect(runOne(workbook, { type: "pivot", range: "A1:C4", rows: ["A"], values: ["B", "C"] })).toEqual({
      type: "pivot",
      pivot_data: [
        { Region: "East", Sales_Value: 13, Units_Value: 5 },
        { Region: "West", Sales_Value: 5, Units_Value: 2 },
      ],
    });
  });
});

describe("batches", () => {
  it("keeps going after an operation-local failure", () => {
    const workbook = new Workbook(["Sheet1"]);
    const outcome = expectOk(
      applyOperations(workbook, [
        { type: "update_cell", cell: "A1", value: 1 },
        { type: "update_cell", value: 2 },
        { type: "update_cell", cell: "A3", value: 3 },
      ]),
    );

    expect(outcome.results).toEqual({
      operation_0: { type: "update_cell", cell: "A1", value: 1 },
      operation_1: { error: "Missing field: cell", code: "MissingField" },
      operation_2: { type: "update_cell", cell: "A3", value: 3 },
    });
    expect(outcome.mutated).toBe(true);
    expect(outcome.rolled_back).toBe(false);
    expect(workbook.getValues("Sheet1", resolveRange("A1:A3"))).toEqual([[1], [null], [3]]);
  });

  it("rolls the whole batch back in all_or_nothing mode", () => {
    const workbook = new Workbook(["Sheet1"]);
    const outcome = expectOk(
      applyOperations(
        workbook,
        [
          { type: "update_cell", cell: "A1", value: 1 },
          { type: "update_cell", value: 2 },
        ],
        { atomicity: "all_or_nothing" },
      ),
    );

    expect(outcome.rolled_back).toBe(true);
    expect(outcome.mutated).toBe(false);
    expect(workbook.getCell("Sheet1", { row: 0, col: 0 }).value).toBeNull();
  });

  it("aborts on an unknown sheet", () => {
    const workbook = new Workbook(["Sheet1"]);
    const executor = new OperationExecutor(workbook, { atomicity: "all_or_nothing" });
    const outcome = executor.executeBatch([
      { type: "update_cell", cell: "A1", value: 1 },
      { type: "update_cell", sheet: "Nope", cell: "A1", value: 1 },
    ]);

    expect(outcome).toEqual({ ok: false, error: { code: "SheetNotFound", message: "Sheet not found: Nope" } });
    expect(workbook.getCell("Sheet1", { row: 0, col: 0 }).value).toBeNull();
  });

  it("treats an unknown sheet in an address prefix as fatal", () => {
    const workbook = new Workbook(["Sheet1"]);
    const outcome = applyOperations(workbook, [{ type: "extract", range: "Missing!A1:B2" }]);
    expect(outcome).toEqual({ ok: false, error: { code: "SheetNotFound", message: "Sheet not found: Missing" } });
  });

  it("reports unsupported and untyped operations", () => {
    const workbook = new Workbook(["Sheet1"]);
    const outcome = expectOk(applyOperations(workbook, [{ type: "formula_result", cell: "A1" }, { cell: "A1" }, 5]));

    expect(outcome.results).toEqual({
      operation_0: { error: "Unsupported operation type: formula_result", code: "UnsupportedOperationType" },
      operation_1: { error: "Missing field: type", code: "MissingField" },
      operation_2: { error: "Operation must be a JSON object", code: "InvalidField" },
    });
    expect(outcome.mutated).toBe(false);
  });

  it("accepts the operation key as the discriminator and JSON text batches", () => {
    const workbook = workbookWith([["h"], [1]]);
    const outcome = expectOk(
      applyOperations(workbook, JSON.stringify({ operations: [{ operation: "extract", range: "A1:A2", format: "rows" }] })),
    );
    expect(outcome.results.operation_0).toEqual({ type: "extract", headers: ["h"], data: [[1]] });
  });

  it("rejects malformed batches", () => {
    const workbook = new Workbook(["Sheet1"]);
    expect(applyOperations(workbook, "{not json")).toMatchObject({ ok: false, error: { code: "MalformedBatch" } });
    expect(applyOperations(workbook, { ops: [] })).toMatchObject({ ok: false, error: { code: "MalformedBatch" } });
  });

  it("treats an empty batch as a no-op", () => {
    const workbook = new Workbook(["Sheet1"]);
    expect(applyOperations(workbook, [])).toEqual({ ok: true, results: {}, mutated: false, rolled_back: false });
  });
});
