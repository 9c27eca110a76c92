import { z, ZodError } from "zod";

import { SUMMARY_METRICS } from "./analysis/statistics.js";
import { WorkbookOpsError } from "./errors.js";

export type OperationType =
  | "update_cell"
  | "add_row"
  | "delete_row"
  | "clear_range"
  | "set_formula"
  | "apply_basic_style"
  | "summary_stats"
  | "filter"
  | "extract"
  | "correlation"
  | "trend_analysis"
  | "pivot";

export type OperationCategory = "mutate" | "format" | "analysis" | "read";

export interface OperationCapabilityMetadata {
  category: OperationCategory;
  mutates_workbook: boolean;
}

/**
 * Static capability metadata for each operation. `mutates_workbook` decides
 * whether a batch needs to be saved back.
 */
export const OPERATION_CAPABILITIES: Record<OperationType, OperationCapabilityMetadata> = {
  update_cell: { category: "mutate", mutates_workbook: true },
  add_row: { category: "mutate", mutates_workbook: true },
  delete_row: { category: "mutate", mutates_workbook: true },
  clear_range: { category: "mutate", mutates_workbook: true },
  set_formula: { category: "mutate", mutates_workbook: true },
  apply_basic_style: { category: "format", mutates_workbook: true },
  summary_stats: { category: "analysis", mutates_workbook: false },
  filter: { category: "read", mutates_workbook: false },
  extract: { category: "read", mutates_workbook: false },
  correlation: { category: "analysis", mutates_workbook: false },
  trend_analysis: { category: "analysis", mutates_workbook: false },
  pivot: { category: "analysis", mutates_workbook: false },
};

export const OperationTypeSchema = z.enum([
  "update_cell",
  "add_row",
  "delete_row",
  "clear_range",
  "set_formula",
  "apply_basic_style",
  "summary_stats",
  "filter",
  "extract",
  "correlation",
  "trend_analysis",
  "pivot",
]);

/** Alternative type names accepted from callers. */
const OPERATION_TYPE_ALIASES: Record<string, OperationType> = {
  format: "apply_basic_style",
  aggregate: "summary_stats",
};

const CellValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const AddressSchema = z.string().trim().min(1, "address must not be empty");
const ColumnLetterSchema = z.string().trim().regex(/^[A-Za-z]+$/, "expected a column letter");
const SheetSchema = z.string().optional();

export const CellStyleSchema = z.object({
  bold: z.boolean().optional(),
  bg_color: z.string().trim().optional(),
  number_format: z.string().optional(),
  align: z.enum(["left", "center", "right"]).optional(),
});

export const FILTER_OPERATORS = [">", ">=", "<", "<=", "==", "=", "!=", "<>", "contains"] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

const UpdateCellSchema = z.object({
  type: z.literal("update_cell"),
  sheet: SheetSchema,
  cell: AddressSchema,
  value: CellValueSchema,
});

const AddRowSchema = z.object({
  type: z.literal("add_row"),
  sheet: SheetSchema,
  values: z.array(CellValueSchema),
});

const DeleteRowSchema = z.object({
  type: z.literal("delete_row"),
  sheet: SheetSchema,
  row_index: z.number().int(),
  count: z.number().int().positive().default(1),
});

const ClearRangeSchema = z.object({
  type: z.literal("clear_range"),
  sheet: SheetSchema,
  range: AddressSchema,
});

const SetFormulaSchema = z.object({
  type: z.literal("set_formula"),
  sheet: SheetSchema,
  cell: AddressSchema,
  formula: z.string().trim().min(1, "formula must not be empty"),
});

const ApplyBasicStyleSchema = z.object({
  type: z.literal("apply_basic_style"),
  sheet: SheetSchema,
  range: AddressSchema,
  style: CellStyleSchema,
});

const SummaryStatsSchema = z.object({
  type: z.literal("summary_stats"),
  sheet: SheetSchema,
  range: AddressSchema,
  metrics: z.array(z.enum(SUMMARY_METRICS)).default(["mean", "sum"]),
});

const FilterSchema = z.object({
  type: z.literal("filter"),
  sheet: SheetSchema,
  range: AddressSchema,
  condition: z.object({
    column: ColumnLetterSchema,
    operator: z.enum(FILTER_OPERATORS),
    value: CellValueSchema,
  }),
});

const ExtractSchema = z.object({
  type: z.literal("extract"),
  sheet: SheetSchema,
  range: AddressSchema,
  format: z.enum(["json", "rows"]).default("json"),
});

const CorrelationSchema = z.object({
  type: z.literal("correlation"),
  sheet: SheetSchema,
  range: AddressSchema,
  columns: z.array(ColumnLetterSchema).length(2, "correlation requires exactly 2 columns"),
});

const TrendAnalysisSchema = z.object({
  type: z.literal("trend_analysis"),
  sheet: SheetSchema,
  range: AddressSchema,
  x_column: ColumnLetterSchema,
  y_column: ColumnLetterSchema,
});

const PivotSchema = z.object({
  type: z.literal("pivot"),
  sheet: SheetSchema,
  range: AddressSchema,
  rows: z.array(ColumnLetterSchema).min(1, "pivot requires at least one row column"),
  columns: z.array(ColumnLetterSchema).default([]),
  values: z.array(ColumnLetterSchema).min(1, "pivot requires at least one value column"),
  aggregation: z
    .enum(["sum", "avg", "mean", "min", "max", "count"])
    .default("sum")
    .transform((aggregation) => (aggregation === "mean" ? "avg" : aggregation)),
});

export const OperationSchema = z.discriminatedUnion("type", [
  UpdateCellSchema,
  AddRowSchema,
  DeleteRowSchema,
  ClearRangeSchema,
  SetFormulaSchema,
  ApplyBasicStyleSchema,
  SummaryStatsSchema,
  FilterSchema,
  ExtractSchema,
  CorrelationSchema,
  TrendAnalysisSchema,
  PivotSchema,
]);

export type Operation = z.infer<typeof OperationSchema>;

export type OperationOf<T extends OperationType> = Extract<Operation, { type: T }>;

export type CellStyleInput = z.infer<typeof CellStyleSchema>;

type RawFields = Record<string, unknown>;

function isRecord(value: unknown): value is RawFields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function alias(params: RawFields, canonical: string, ...alternatives: string[]): void {
  if (params[canonical] !== undefined) return;
  for (const alternative of alternatives) {
    if (params[alternative] !== undefined) {
      params[canonical] = params[alternative];
      return;
    }
  }
}

const FLAT_STYLE_KEYS: Array<[string, ...string[]]> = [
  ["bold"],
  ["bg_color", "bgColor", "background_color", "backgroundColor"],
  ["number_format", "numberFormat"],
  ["align", "horizontal_align", "horizontalAlign"],
];

function normalizeStyleFields(source: RawFields): RawFields {
  const style: RawFields = {};
  const copy = { ...source };
  for (const [canonical, ...alternatives] of FLAT_STYLE_KEYS) {
    alias(copy, canonical, ...alternatives);
    if (copy[canonical] !== undefined) style[canonical] = copy[canonical];
  }
  return style;
}

/**
 * Maps field aliases accepted from callers onto canonical names. Operations in
 * modification lists historically used `target`/`data`/`source_data`, and some
 * callers send camelCase.
 */
function normalizeOperationFields(type: OperationType, parameters: RawFields): RawFields {
  const params: RawFields = { ...parameters, type };

  switch (type) {
    case "update_cell":
    case "set_formula":
      alias(params, "cell", "target", "address");
      break;
    case "add_row":
      alias(params, "values", "data", "row");
      break;
    case "delete_row":
      alias(params, "row_index", "rowIndex", "index");
      break;
    case "clear_range":
    case "summary_stats":
    case "extract":
      alias(params, "range", "target");
      break;
    case "apply_basic_style":
      alias(params, "range", "target");
      if (params.style === undefined) params.style = normalizeStyleFields(params);
      else if (isRecord(params.style)) params.style = normalizeStyleFields(params.style);
      break;
    case "filter":
      alias(params, "range", "target");
      if (params.condition === undefined && params.column !== undefined) {
        params.condition = { column: params.column, operator: params.operator, value: params.value };
      }
      break;
    case "correlation":
      alias(params, "range", "target");
      break;
    case "trend_analysis":
      alias(params, "range", "target");
      alias(params, "x_column", "xColumn");
      alias(params, "y_column", "yColumn");
      break;
    case "pivot":
      alias(params, "range", "source_data", "sourceData", "target");
      break;
    default: {
      const exhaustive: never = type;
      throw new Error(`Unhandled operation type: ${exhaustive}`);
    }
  }

  return params;
}

function describePath(path: Array<string | number>): string {
  return path.length === 0 ? "operation" : path.join(".");
}

/**
 * Converts a zod failure into the operation-local error taxonomy. Only the
 * first issue is reported.
 */
export function normalizeValidationError(error: ZodError): WorkbookOpsError {
  const [issue] = error.issues;
  if (!issue) return new WorkbookOpsError("InvalidField", "Operation failed validation");

  const field = describePath(issue.path);
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
    return new WorkbookOpsError("MissingField", `Missing field: ${field}`, error.flatten());
  }
  return new WorkbookOpsError("InvalidField", `Invalid field ${field}: ${issue.message}`, error.flatten());
}

export function resolveOperationType(raw: unknown): OperationType {
  if (raw === undefined || raw === null || raw === "") {
    throw new WorkbookOpsError("MissingField", "Missing field: type");
  }
  if (typeof raw !== "string") {
    throw new WorkbookOpsError("InvalidField", "Invalid field type: expected a string");
  }
  const name = raw.trim();
  const parsed = OperationTypeSchema.safeParse(OPERATION_TYPE_ALIASES[name] ?? name);
  if (!parsed.success) {
    throw new WorkbookOpsError("UnsupportedOperationType", `Unsupported operation type: ${name}`);
  }
  return parsed.data;
}

/**
 * Validates one raw operation (either shape: `type` or `operation` as the
 * discriminator) into a typed `Operation`.
 */
export function validateOperation(raw: unknown): Operation {
  if (!isRecord(raw)) {
    throw new WorkbookOpsError("InvalidField", "Operation must be a JSON object");
  }

  const type = resolveOperationType(raw.type ?? raw.operation);
  const params = normalizeOperationFields(type, raw);
  try {
    return OperationSchema.parse(params);
  } catch (error) {
    if (error instanceof ZodError) throw normalizeValidationError(error);
    throw error;
  }
}
