import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { mkdirSync, writeFileSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { MemoryVulnerabilityDatabase } from "@sweepr/engine";
import { UsageError } from "../args.js";
import { runClean } from "../commands/clean.js";
import { resolveFormat } from "../commands/report.js";
import { runRules } from "../commands/rules.js";
import { runVuln } from "../commands/vuln.js";

const TEST_DIR = join(tmpdir(), `sweepr-cli-test-${Date.now()}`);
const BAD_DIR = join(tmpdir(), `sweepr-cli-bad-${Date.now()}`);

function writeProject(): void {
  mkdirSync(TEST_DIR, { recursive: true });
  mkdirSync(BAD_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, ".sweepr.yml"), "entry_points:\n  - \"*.ts\"\npackage_allowlist: []\n");
  writeFileSync(join(TEST_DIR, "package.json"), '{ "dependencies": { "dayjs": "^1.11.0" } }\n');
  writeFileSync(join(TEST_DIR, "main.ts"), "export const a = 1;\nconsole.log(a);\n");
  writeFileSync(join(TEST_DIR, "run.ts"), "export const run = (s: string) => eval(s);\n");
  writeFileSync(join(BAD_DIR, ".sweepr.yml"), "entry_points:\n  - src/**\n");
  writeFileSync(join(BAD_DIR, "index.ts"), "export {};\n");
}

function written(spy: MockInstance): string {
  return spy.mock.calls.map((call) => String(call[0])).join("");
}

interface JsonReport {
  mode: string;
  findings: Array<{ ruleId: string; filePath: string }>;
}

function parseReport(text: string): JsonReport {
  const data: JsonReport = JSON.parse(text);
  return data;
}

describe("report commands", () => {
  let stdout: MockInstance;
  let stderr: MockInstance;

  beforeEach(() => {
    writeProject();
    process.env.SWEEPR_LOG_LEVEL = "silent";
    stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    rmSync(BAD_DIR, { recursive: true, force: true });
    delete process.env.SWEEPR_LOG_LEVEL;
    vi.restoreAllMocks();
  });

  it("clean prints a JSON report and exits 0 below the fail-on severity", async () => {
    const code = await runClean({ path: TEST_DIR, format: "json" });
    const report = parseReport(written(stdout));

    expect(code).toBe(0);
    expect(report.mode).toBe("clean");
    expect(report.findings.map((f) => [f.ruleId, f.filePath])).toEqual([
      ["clean-console-statement", "main.ts"],
      ["clean-unused-package", "package.json"],
    ]);
  });

  it("--fail-on overrides the configured threshold", async () => {
    expect(await runClean({ path: TEST_DIR, format: "json", failOn: "low" })).toBe(1);
    await expect(runClean({ path: TEST_DIR, failOn: "severe" })).rejects.toBeInstanceOf(UsageError);
  });

  it("writes CSV when the output file ends in .csv", async () => {
    const out = join(TEST_DIR, "report.csv");
    await runClean({ path: TEST_DIR, output: out });

    expect(readFileSync(out, "utf-8")).toBe(
      "category,severity,file path,line,description\n" +
        "ConsoleStatement,low,main.ts,2,console.log() call\n" +
        "UnusedPackage,unused,package.json,1,'dayjs' is declared in dependencies but never imported\n",
    );
    expect(written(stdout)).toBe("");
    expect(written(stderr)).toBe(`[sweepr] Report written to ${out}\n`);
  });

  it("exits 2 on a configuration error", async () => {
    const code = await runClean({ path: BAD_DIR });
    expect(code).toBe(2);
    expect(written(stderr)).toBe(
      "[sweepr] Configuration error: Entry point rule 'src/**' refers to 'src', which does not exist\n",
    );
  });

  it("vuln --offline reports patterns only", async () => {
    const code = await runVuln({ path: TEST_DIR, format: "json", offline: true });
    expect(code).toBe(1);
    expect(parseReport(written(stdout)).findings.map((f) => [f.ruleId, f.filePath])).toEqual([["vuln-eval", "run.ts"]]);
  });

  it("vuln queries the injected database", async () => {
    const database = new MemoryVulnerabilityDatabase({
      dayjs: [{ id: "GHSA-test", title: "Test advisory", severity: "high" }],
    });
    await runVuln({ path: TEST_DIR, format: "json", offline: false, database });

    expect(database.queries).toEqual([{ name: "dayjs", version: "1.11.0" }]);
    expect(parseReport(written(stdout)).findings.map((f) => f.ruleId)).toEqual([
      "vuln-known-vulnerability",
      "vuln-eval",
    ]);
  });
});

describe("resolveFormat", () => {
  it("prefers the explicit format, then the output extension", () => {
    expect(resolveFormat("json", "out.csv")).toBe("json");
    expect(resolveFormat(undefined, "OUT.CSV")).toBe("csv");
    expect(resolveFormat(undefined, undefined)).toBe("table");
    expect(() => resolveFormat("xml", undefined)).toThrow("invalid format 'xml'. Must be one of: table, csv, json");
  });
});

describe("runRules", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists the rules of one mode", () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    runRules("clean");
    const out = written(stdout);
    expect(out).toContain("clean-unused-import");
    expect(out).not.toContain("vuln-eval");
    expect(out).toContain("  10 rules total\n");
  });

  it("rejects an unknown mode", () => {
    expect(() => runRules("audit")).toThrow(UsageError);
  });
});
