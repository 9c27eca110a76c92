import { describe, expect, it } from "vitest";

import { dedent, sanitizeScript } from "../src/sanitizer.js";

describe("dedent", () => {
  it("removes common indentation and surrounding blank lines", () => {
    expect(dedent("\n  a\n    b\n\n  c\n")).toBe("a\n  b\n\nc");
  });

  it("leaves unindented text alone", () => {
    expect(dedent("a\n  b")).toBe("a\n  b");
  });
});

describe("sanitizeScript", () => {
  it("drops denylisted lines and import statements", () => {
    const { script, removed } = sanitizeScript(`
    const fs = require("fs");
    const total = input_data.values.reduce((a, b) => a + b, 0);
    process.exit(1);
    import path from "node:path";
    const refs = [1]; const n = refs.length;
    output = { total };
`);

    expect(script).toBe(
      [
        "const total = input_data.values.reduce((a, b) => a + b, 0);",
        "const refs = [1]; const n = refs.length;",
        "output = { total };",
      ].join("\n"),
    );
    expect(removed).toEqual([
      { line: 1, text: 'const fs = require("fs");', reason: 'contains "require("' },
      { line: 3, text: "process.exit(1);", reason: 'contains "process."' },
      { line: 4, text: 'import path from "node:path";', reason: "import statement" },
    ]);
  });

  it("matches case-sensitively and at identifier boundaries", () => {
    const { script, removed } = sanitizeScript(
      ["const f = function(x) { return x; };", "const g = new Function(\"return 1\");", "medieval(1);"].join("\n"),
    );

    expect(script).toBe("const f = function(x) { return x; };\nmedieval(1);");
    expect(removed.map((entry) => entry.reason)).toEqual(['contains "Function("']);
  });

  it("removes re-exports and prototype tricks", () => {
    const { removed } = sanitizeScript(
      ['export { helper } from "./helper.js";', "const p = {}.__proto__;", "const c = x.constructor.constructor;"].join(
        "\n",
      ),
    );
    expect(removed.map((entry) => entry.reason)).toEqual([
      "re-export statement",
      'contains "__proto__"',
      'contains "constructor.constructor"',
    ]);
  });
});
