import { describe, it, expect } from "vitest";
import { createFinding, getRulesForMode } from "@sweepr/engine";
import { CSV_HEADER, csvField, formatCsv, formatReport, formatRulesTable, type Report } from "../formatter.js";

const FINDINGS = [
  createFinding("clean-console-statement", {
    filePath: "src/a.ts",
    startLine: 4,
    description: "console.log() call",
  }),
  createFinding("clean-unused-css-class", {
    filePath: "components/Card.vue",
    startLine: 12,
    symbol: "title",
    description: 'Class ".title, .x" is "never" used',
  }),
];

const REPORT: Report = { mode: "clean", findings: FINDINGS, summary: "clean: 2 units analysed, 0 skipped, 2 findings" };

describe("csvField", () => {
  it("quotes fields with commas, quotes or line breaks", () => {
    expect(csvField("plain")).toBe("plain");
    expect(csvField("a,b")).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField("two\nlines")).toBe('"two\nlines"');
    expect(csvField(7)).toBe("7");
  });
});

describe("formatCsv", () => {
  it("writes the header and one row per finding", () => {
    expect(CSV_HEADER.join(",")).toBe("category,severity,file path,line,description");
    expect(formatCsv(FINDINGS)).toBe(
      "category,severity,file path,line,description\n" +
        "ConsoleStatement,low,src/a.ts,4,console.log() call\n" +
        'UnusedCssClass,unused,components/Card.vue,12,"Class "".title, .x"" is ""never"" used"\n',
    );
  });

  it("writes only the header when there are no findings", () => {
    expect(formatCsv([])).toBe("category,severity,file path,line,description\n");
  });
});

describe("formatReport", () => {
  it("emits JSON with mode, summary and findings", () => {
    const parsed: unknown = JSON.parse(formatReport(REPORT, { format: "json" }));
    expect(parsed).toEqual({ mode: "clean", summary: REPORT.summary, findings: FINDINGS });
  });

  it("renders a plain table grouped by severity", () => {
    const out = formatReport(REPORT, { format: "table" });
    expect(out).not.toContain("\x1b[");
    expect(out.indexOf("  LOW (1)")).toBeGreaterThan(-1);
    expect(out.indexOf("  LOW (1)")).toBeLessThan(out.indexOf("  UNUSED (1)"));
    expect(out).toContain("                    components/Card.vue:12\n");
    expect(out.endsWith("  clean: 2 units analysed, 0 skipped, 2 findings\n")).toBe(true);
  });

  it("says so when there is nothing to report", () => {
    const out = formatReport({ mode: "vuln", findings: [], summary: "vuln: 0 units analysed, 0 skipped, 0 findings" }, { format: "table" });
    expect(out).toContain("  No issues found.\n");
  });

  it("colours the table only when asked", () => {
    expect(formatReport(REPORT, { format: "table", color: true })).toContain("\x1b[34m LOW ");
  });
});

describe("formatRulesTable", () => {
  it("lists each rule and the total", () => {
    const rules = getRulesForMode("vuln");
    const out = formatRulesTable(rules);
    expect(out).toContain("vuln-eval");
    expect(out).toContain("sys-parse-error");
    expect(out.endsWith(`  ${rules.length} rules total\n`)).toBe(true);
  });
});
