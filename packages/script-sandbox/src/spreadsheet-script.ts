import { FileNotFoundError, InvalidHandleError } from "@tabula/file-store";
import { WorkbookOpsError, type SpreadsheetDescription, type SpreadsheetService } from "@tabula/workbook-ops";

import type { SandboxCapabilities } from "./capabilities.js";
import { GenerationFailedError, type ScriptFailure } from "./errors.js";
import type { ScriptGenerator } from "./generator.js";
import type { ScriptRunResult, ScriptSandbox } from "./sandbox.js";

export interface SpreadsheetScriptDependencies {
  spreadsheets: SpreadsheetService;
  generator: ScriptGenerator;
  sandbox: ScriptSandbox;
  capabilities: SandboxCapabilities;
}

export interface SpreadsheetScriptRequest {
  instruction: string;
  handle: string;
  timeoutMs?: number;
}

/** The run result plus the script that produced it (`null` when none was generated). */
export type SpreadsheetScriptResult = ScriptRunResult & { script: string | null };

const OUTPUT_REQUIREMENTS = {
  output: "object describing the result",
  files: "handles of any files written, e.g. output.file_handle = await write_excel(...)",
};

function isWorkbookReadError(error: unknown): error is Error {
  return (
    error instanceof WorkbookOpsError || error instanceof FileNotFoundError || error instanceof InvalidHandleError
  );
}

function failed(error: ScriptFailure): SpreadsheetScriptResult {
  return { success: false, error, logs: [], removed_lines: [], script: null };
}

/**
 * Custom spreadsheet work that the fixed operation set can't express: describe
 * the workbook, have a script generated for the instruction, then run it with
 * `{ file_handle, spreadsheet_data }` as input.
 *
 * A workbook that is missing or unreadable is reported as a failed result
 * before anything is generated.
 */
export async function runSpreadsheetScript(
  deps: SpreadsheetScriptDependencies,
  request: SpreadsheetScriptRequest,
): Promise<SpreadsheetScriptResult> {
  let description: SpreadsheetDescription;
  try {
    description = await deps.spreadsheets.describeSpreadsheet(request.handle);
  } catch (error) {
    if (!isWorkbookReadError(error)) throw error;
    return failed({ kind: "ScriptRuntimeError", message: error.message });
  }
  const input = { file_handle: request.handle, spreadsheet_data: description };

  let script: string;
  try {
    script = await deps.generator.generate({
      task: request.instruction,
      inputSchema: {
        file_handle: "string: handle of the workbook, readable with read_excel / read_excel_all",
        spreadsheet_data: description,
      },
      outputRequirements: OUTPUT_REQUIREMENTS,
    });
  } catch (error) {
    if (!(error instanceof GenerationFailedError)) throw error;
    return failed({ kind: "GenerationFailed", message: error.message });
  }

  const result = await deps.sandbox.run({ script, input, timeoutMs: request.timeoutMs }, deps.capabilities);
  return { ...result, script };
}
