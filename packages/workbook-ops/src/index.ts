export * from "./a1.js";
export * from "./analysis/pivot.js";
export * from "./analysis/statistics.js";
export * from "./analysis/table.js";
export * from "./create-spreadsheet.js";
export * from "./describe.js";
export * from "./errors.js";
export * from "./executor/operation-executor.js";
export * from "./handle-lock.js";
export * from "./number-parsing.js";
export * from "./operation-schema.js";
export * from "./records.js";
export * from "./spreadsheet-service.js";
export * from "./types.js";
export * from "./workbook.js";
export * from "./xlsx-codec.js";
