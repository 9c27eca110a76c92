export type WorkbookOpsErrorCode =
  | "InvalidAddress"
  | "CorruptWorkbook"
  | "SheetNotFound"
  | "MissingField"
  | "InvalidField"
  | "UnsupportedOperationType"
  | "InvalidIndex"
  | "InsufficientData"
  | "MalformedBatch";

/**
 * Failures that abort a whole batch rather than a single operation.
 */
export const BATCH_FATAL_CODES: ReadonlySet<WorkbookOpsErrorCode> = new Set<WorkbookOpsErrorCode>([
  "SheetNotFound",
  "MalformedBatch",
  "CorruptWorkbook",
]);

export class WorkbookOpsError extends Error {
  readonly code: WorkbookOpsErrorCode;
  readonly details?: unknown;

  constructor(code: WorkbookOpsErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "WorkbookOpsError";
    this.code = code;
    if (details !== undefined) this.details = details;
  }
}

export function isWorkbookOpsError(error: unknown): error is WorkbookOpsError {
  return error instanceof WorkbookOpsError;
}
