import { WorkbookOpsError } from "./errors.js";

export type CellValue = null | number | string | boolean;

export type HorizontalAlign = "left" | "center" | "right";

export interface CellStyle {
  bold?: boolean;
  /** Fill color as 8-digit aRGB (`FFFFFF00`). */
  bg_color?: string;
  number_format?: string;
  align?: HorizontalAlign;
}

export interface CellData {
  value: CellValue;
  /**
   * Formula string including leading "=".
   *
   * Formulas are not evaluated. `value` holds whatever result the file cached,
   * or `null` for formulas written through the model.
   */
  formula?: string;
  style?: CellStyle;
}

export function isStyleEmpty(style: CellStyle | undefined): boolean {
  if (!style) return true;
  return (
    style.bold === undefined &&
    style.bg_color === undefined &&
    style.number_format === undefined &&
    style.align === undefined
  );
}

export function isCellEmpty(cell: CellData): boolean {
  return cell.value === null && !cell.formula && isStyleEmpty(cell.style);
}

/**
 * Copy of a style with keys in a fixed order and unset keys dropped.
 */
export function normalizeStyle(style: CellStyle | undefined): CellStyle | undefined {
  if (!style || isStyleEmpty(style)) return undefined;
  const out: CellStyle = {};
  if (style.bold !== undefined) out.bold = style.bold;
  if (style.bg_color !== undefined) out.bg_color = style.bg_color;
  if (style.number_format !== undefined) out.number_format = style.number_format;
  if (style.align !== undefined) out.align = style.align;
  return out;
}

export function mergeStyle(base: CellStyle | undefined, patch: CellStyle): CellStyle | undefined {
  return normalizeStyle({ ...(base ?? {}), ...patch });
}

export function cloneCell(cell: CellData): CellData {
  const out: CellData = { value: cell.value };
  if (cell.formula) out.formula = cell.formula;
  const style = normalizeStyle(cell.style);
  if (style) out.style = style;
  return out;
}

/**
 * Accepts `RRGGBB`, `#RRGGBB` or `AARRGGBB` and returns upper-case aRGB.
 */
export function normalizeColor(input: string): string {
  const hex = input.trim().replace(/^#/, "").toUpperCase();
  if (/^[0-9A-F]{6}$/.test(hex)) return `FF${hex}`;
  if (/^[0-9A-F]{8}$/.test(hex)) return hex;
  throw new WorkbookOpsError("InvalidField", `Invalid color "${input}": expected 6 or 8 hex digits`);
}

export function normalizeFormula(formula: string): string {
  const trimmed = formula.trim();
  return trimmed.startsWith("=") ? trimmed : `=${trimmed}`;
}
