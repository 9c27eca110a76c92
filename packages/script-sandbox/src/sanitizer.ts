/**
 * Substrings that never survive sanitization. A line containing any of them is
 * dropped whole. Entries that start with an identifier character only match at
 * an identifier boundary, so `refs.length` is not mistaken for `fs.`.
 */
export const SCRIPT_DENYLIST = [
  "require(",
  "process.",
  "child_process",
  "import(",
  "eval(",
  "Function(",
  "globalThis",
  "constructor.constructor",
  "__proto__",
  "fs.",
  ".unlink(",
  ".rmSync(",
  "Deno.",
  "Bun.",
  "worker_threads",
  "vm.",
] as const;

const IMPORT_LINE = /^\s*import[\s{*"']/;
const EXPORT_FROM_LINE = /^\s*export\b.*\bfrom\s*["']/;

export interface RemovedLine {
  /** 1-based line number in the dedented script. */
  line: number;
  text: string;
  reason: string;
}

export interface SanitizedScript {
  script: string;
  removed: RemovedLine[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const DENYLIST_PATTERNS = SCRIPT_DENYLIST.map((entry) => ({
  entry,
  pattern: new RegExp(`${/^[\w$]/.test(entry) ? "(?<![\\w$])" : ""}${escapeRegExp(entry)}`),
}));

/**
 * Removes the common leading indentation and surrounding blank lines.
 */
export function dedent(text: string): string {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  while (lines.length > 0 && (lines[0] ?? "").trim() === "") lines.shift();
  while (lines.length > 0 && (lines[lines.length - 1] ?? "").trim() === "") lines.pop();

  let indent = Number.POSITIVE_INFINITY;
  for (const line of lines) {
    if (line.trim() === "") continue;
    const leading = line.length - line.trimStart().length;
    indent = Math.min(indent, leading);
  }
  if (!Number.isFinite(indent) || indent === 0) return lines.join("\n");
  return lines.map((line) => (line.trim() === "" ? "" : line.slice(indent))).join("\n");
}

function rejectionReason(line: string): string | null {
  if (IMPORT_LINE.test(line)) return "import statement";
  if (EXPORT_FROM_LINE.test(line)) return "re-export statement";
  for (const { entry, pattern } of DENYLIST_PATTERNS) {
    if (pattern.test(line)) return `contains "${entry}"`;
  }
  return null;
}

/**
 * First line of defence before a script reaches the sandbox. The sandbox does
 * not rely on it: everything the denylist names is unreachable there anyway.
 */
export function sanitizeScript(text: string): SanitizedScript {
  const kept: string[] = [];
  const removed: RemovedLine[] = [];

  dedent(text)
    .split("\n")
    .forEach((line, index) => {
      const reason = rejectionReason(line);
      if (reason === null) {
        kept.push(line);
        return;
      }
      removed.push({ line: index + 1, text: line.trim(), reason });
    });

  return { script: kept.join("\n"), removed };
}
