import { describe, it, expect } from "vitest";
import { createFinding, dedupeFindings, sortFindings } from "../findings.js";

describe("createFinding", () => {
  it("takes title, category and severity from the rule", () => {
    const f = createFinding("clean-unused-import", { filePath: "a.ts", startLine: 3, description: "x" });
    expect(f).toMatchObject({
      category: "UnusedImport",
      severity: "unused",
      title: "Unused import",
      endLine: 3,
      column: 0,
      codeSnippet: "",
    });
  });

  it("lets the caller override the severity", () => {
    const f = createFinding("clean-unused-export", { filePath: "a.ts", startLine: 1, description: "x", severity: "possibly-unused" });
    expect(f.severity).toBe("possibly-unused");
  });

  it("rejects positions that are not line numbers", () => {
    expect(() => createFinding("clean-unused-import", { filePath: "a.ts", startLine: -1, description: "x" })).toThrow();
    expect(() => createFinding("clean-unused-import", { filePath: "a.ts", startLine: 2.5, description: "x" })).toThrow();
  });

  it("throws on an unknown rule", () => {
    expect(() => createFinding("no-such-rule", { filePath: "a.ts", startLine: 1, description: "x" })).toThrow(
      "Unknown rule 'no-such-rule'",
    );
  });
});

describe("dedupeFindings", () => {
  it("keeps the first finding per file, position, rule and symbol", () => {
    const first = createFinding("clean-unused-import", { filePath: "a.ts", startLine: 1, column: 8, symbol: "x", description: "first" });
    const second = createFinding("clean-unused-import", { filePath: "a.ts", startLine: 1, column: 8, symbol: "x", description: "second" });
    const other = createFinding("clean-unused-import", { filePath: "a.ts", startLine: 1, column: 8, symbol: "y", description: "other" });
    expect(dedupeFindings([first, second, other]).map((f) => f.description)).toEqual(["first", "other"]);
  });
});

describe("sortFindings", () => {
  it("orders by file, line, column and rule", () => {
    const make = (filePath: string, startLine: number, column: number, ruleId: string) =>
      createFinding(ruleId, { filePath, startLine, column, description: `${filePath}:${startLine}:${column}` });
    const sorted = sortFindings([
      make("b.ts", 1, 1, "clean-unused-import"),
      make("a.ts", 10, 1, "clean-unused-import"),
      make("a.ts", 2, 5, "clean-unused-variable"),
      make("a.ts", 2, 5, "clean-unused-import"),
      make("a.ts", 2, 1, "clean-unused-import"),
      make("B.ts", 1, 1, "clean-unused-import"),
    ]);
    expect(sorted.map((f) => `${f.description} ${f.ruleId}`)).toEqual([
      "B.ts:1:1 clean-unused-import",
      "a.ts:2:1 clean-unused-import",
      "a.ts:2:5 clean-unused-import",
      "a.ts:2:5 clean-unused-variable",
      "a.ts:10:1 clean-unused-import",
      "b.ts:1:1 clean-unused-import",
    ]);
  });
});
