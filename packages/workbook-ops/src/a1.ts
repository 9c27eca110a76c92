import { WorkbookOpsError } from "./errors.js";

/**
 * Zero-based cell coordinates. `A1` is `{ row: 0, col: 0 }`.
 */
export interface CellRef {
  row: number;
  col: number;
}

export interface RangeRef {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

export interface ResolvedCell extends CellRef {
  /** Sheet named by a `Sheet!` prefix, when the address carried one. */
  sheet?: string;
}

export interface ResolvedRange extends RangeRef {
  sheet?: string;
}

// Support absolute references (e.g. $A$1) by allowing optional `$` markers.
const CELL_RE = /^\$?([A-Z]+)\$?([1-9]\d*)$/i;

function invalidAddress(message: string): WorkbookOpsError {
  return new WorkbookOpsError("InvalidAddress", message);
}

export function columnLabelToIndex(label: string): number {
  const normalized = label.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw invalidAddress(`Invalid column label: "${label}"`);
  }

  let value = 0;
  for (const char of normalized) {
    value = value * 26 + (char.charCodeAt(0) - 64);
  }
  if (!Number.isSafeInteger(value)) {
    throw invalidAddress(`Column label out of range: "${label}"`);
  }
  return value - 1;
}

export function columnIndexToLabel(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw invalidAddress(`Invalid column index: ${index}`);
  }

  let value = index + 1;
  let label = "";
  while (value > 0) {
    const remainder = (value - 1) % 26;
    label = String.fromCharCode(65 + remainder) + label;
    value = Math.floor((value - 1) / 26);
  }

  return label;
}

function parseSheetPrefix(input: string): { sheet?: string; rest: string } {
  const bangIndex = input.lastIndexOf("!");
  if (bangIndex === -1) {
    return { rest: input.trim() };
  }

  const rawSheet = input.slice(0, bangIndex).trim();
  const rest = input.slice(bangIndex + 1).trim();
  if (!rawSheet) {
    throw invalidAddress(`Invalid reference: missing sheet name before "!" in "${input}"`);
  }

  // Excel style: 'Sheet Name'!A1 (single quotes, '' to escape).
  const sheet =
    rawSheet.startsWith("'") && rawSheet.endsWith("'") && rawSheet.length >= 2
      ? rawSheet.slice(1, -1).replace(/''/g, "'")
      : rawSheet;

  if (!sheet) {
    throw invalidAddress(`Invalid reference: empty sheet name in "${input}"`);
  }

  return { sheet, rest };
}

function parseCellBody(body: string, input: string): CellRef {
  const match = CELL_RE.exec(body);
  if (!match) {
    throw invalidAddress(`Invalid cell reference: "${input}"`);
  }

  const [, letters = "", digits = ""] = match;
  const row = Number(digits);
  if (!Number.isSafeInteger(row) || row <= 0) {
    throw invalidAddress(`Invalid row number in cell reference: "${input}"`);
  }

  return { row: row - 1, col: columnLabelToIndex(letters) };
}

export function resolveCell(address: string): ResolvedCell {
  if (typeof address !== "string") {
    throw invalidAddress(`Cell reference must be a string, got ${typeof address}`);
  }
  const { sheet, rest } = parseSheetPrefix(address);
  const cell = parseCellBody(rest, address);
  return sheet === undefined ? cell : { sheet, ...cell };
}

export function resolveRange(range: string): ResolvedRange {
  if (typeof range !== "string") {
    throw invalidAddress(`Range reference must be a string, got ${typeof range}`);
  }
  const { sheet, rest } = parseSheetPrefix(range);
  const parts = rest.split(":").map((part) => part.trim());
  if (parts.length > 2) {
    throw invalidAddress(`Invalid range reference: "${range}"`);
  }

  const [first = "", second] = parts;
  const start = parseCellBody(first, range);
  const end = second === undefined ? start : parseCellBody(second, range);

  const resolved: RangeRef = {
    startRow: Math.min(start.row, end.row),
    startCol: Math.min(start.col, end.col),
    endRow: Math.max(start.row, end.row),
    endCol: Math.max(start.col, end.col),
  };
  return sheet === undefined ? resolved : { sheet, ...resolved };
}

function formatSheetName(sheet: string): string {
  // Quote names with spaces or punctuation, and names that read as a cell
  // reference ("AB12"), doubling embedded quotes.
  const looksLikeCell = /^[A-Za-z]{1,3}\d+$/.test(sheet);
  if (/^[A-Za-z_][A-Za-z0-9_.]*$/.test(sheet) && !looksLikeCell) return sheet;
  return `'${sheet.replace(/'/g, "''")}'`;
}

export function formatCell(cell: CellRef, sheet?: string): string {
  const body = `${columnIndexToLabel(cell.col)}${cell.row + 1}`;
  return sheet === undefined ? body : `${formatSheetName(sheet)}!${body}`;
}

export function formatRange(range: RangeRef, sheet?: string): string {
  const start = formatCell({ row: range.startRow, col: range.startCol });
  const end = formatCell({ row: range.endRow, col: range.endCol });
  const body = start === end ? start : `${start}:${end}`;
  return sheet === undefined ? body : `${formatSheetName(sheet)}!${body}`;
}

export function rangeSize(range: RangeRef): { rows: number; cols: number } {
  return {
    rows: range.endRow - range.startRow + 1,
    cols: range.endCol - range.startCol + 1,
  };
}

/**
 * Offset of a column (by letter) relative to the first column of `range`.
 */
export function columnOffsetInRange(label: string, range: RangeRef): number {
  const col = columnLabelToIndex(label);
  if (col < range.startCol || col > range.endCol) {
    throw invalidAddress(`Column ${label.trim().toUpperCase()} is outside range ${formatRange(range)}`);
  }
  return col - range.startCol;
}
