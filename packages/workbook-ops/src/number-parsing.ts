/**
 * Parse a number the way it is typically typed into a spreadsheet or a
 * request: plain numerals, thousands separators ("1,200"), a leading currency
 * symbol ("$5", "-€5"), a trailing percent ("10%" -> 0.1) and accounting-style
 * negatives ("(1,200)").
 *
 * Dates and other strings that merely start with digits ("2024-01-01") are not
 * numbers.
 */
export function parseSpreadsheetNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;

  let text = value.trim();
  if (text === "") return null;

  const direct = Number(text);
  if (Number.isFinite(direct)) return direct;

  const hasParens = text.startsWith("(") && text.endsWith(")");
  if (hasParens) {
    text = text.slice(1, -1).trim();
  }

  let scale = 1;
  if (text.endsWith("%")) {
    scale = 0.01;
    text = text.slice(0, -1).trim();
  }

  let sign = 1;
  const leadingSign = text.startsWith("-") || text.startsWith("+");
  if (leadingSign) {
    if (text.startsWith("-")) sign = -1;
    text = text.slice(1).trimStart();
  }

  if (/^[$€£]/.test(text)) {
    text = text.slice(1).trimStart();
    // "$-5"
    if (!leadingSign && (text.startsWith("-") || text.startsWith("+"))) {
      if (text.startsWith("-")) sign = -1;
      text = text.slice(1).trimStart();
    }
  }

  if (!/^(?:\d+|\d{1,3}(?:,\d{3})+)(?:\.\d*)?$|^\.\d+$/.test(text)) return null;

  const parsed = Number(text.replaceAll(",", ""));
  if (!Number.isFinite(parsed)) return null;
  const result = parsed * sign * scale;
  // Parentheses mark a negative; "(-5)" is already one.
  return hasParens && result > 0 ? -result : result;
}

/** True for cells that analysis operations treat as numeric. */
export function isNumericCell(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
