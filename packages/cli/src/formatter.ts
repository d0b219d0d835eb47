import { SEVERITY_ORDER, type Finding, type Rule, type RunMode, type Severity } from "@sweepr/engine";

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const WHITE = "\x1b[37m";

export const FORMATS = ["table", "csv", "json"] as const;
export type OutputFormat = (typeof FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some((f) => f === value);
}

export interface Report {
  mode: RunMode;
  findings: Finding[];
  summary: string;
}

export interface FormatOptions {
  format: OutputFormat;
  color?: boolean;
}

function severityColor(severity: Severity): string {
  switch (severity) {
    case "critical": return BG_RED + WHITE;
    case "high": return RED;
    case "medium": return YELLOW;
    case "low": return BLUE;
    case "unused": return MAGENTA;
    case "possibly-unused": return CYAN;
    case "info": return DIM;
  }
}

export function formatReport(report: Report, options: FormatOptions): string {
  switch (options.format) {
    case "json":
      return formatJson(report);
    case "csv":
      return formatCsv(report.findings);
    case "table":
      return formatTable(report, options.color ?? false);
  }
}

function formatJson(report: Report): string {
  return JSON.stringify({ mode: report.mode, summary: report.summary, findings: report.findings }, null, 2) + "\n";
}

/* ------------------------------------------------------------------ */
/*  CSV                                                                */
/* ------------------------------------------------------------------ */

export const CSV_HEADER = ["category", "severity", "file path", "line", "description"];

/** RFC 4180 quoting: fields with a comma, quote or line break are quoted. */
export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsv(findings: readonly Finding[]): string {
  const rows = [CSV_HEADER.map(csvField).join(",")];
  for (const f of findings) {
    rows.push([f.category, f.severity, f.filePath, f.startLine, f.description].map(csvField).join(","));
  }
  return rows.join("\n") + "\n";
}

/* ------------------------------------------------------------------ */
/*  Table                                                              */
/* ------------------------------------------------------------------ */

function formatTable(report: Report, color: boolean): string {
  const c = (code: string, text: string): string => (color ? `${code}${text}${RESET}` : text);
  const badge = (severity: Severity): string => c(severityColor(severity), ` ${severity.toUpperCase().padEnd(15)} `);

  const lines: string[] = [];
  lines.push("");
  lines.push(c(BOLD + CYAN, `  sweepr ${report.mode} report`));
  lines.push("");

  if (report.findings.length === 0) {
    lines.push(c(GREEN, "  No issues found."));
  }

  // Group by severity
  const grouped = new Map<Severity, Finding[]>();
  for (const f of report.findings) {
    const group = grouped.get(f.severity);
    if (group) group.push(f);
    else grouped.set(f.severity, [f]);
  }

  for (const severity of SEVERITY_ORDER) {
    const group = grouped.get(severity);
    if (!group) continue;

    lines.push(c(BOLD, `  ${severity.toUpperCase()} (${group.length})`));
    lines.push("");
    for (const f of group) {
      lines.push(`  ${badge(f.severity)} ${c(BOLD, f.title)}`);
      lines.push(`                    ${c(DIM, `${f.filePath}:${f.startLine}`)}`);
      lines.push(`                    ${f.description}`);
      lines.push(`                    ${c(DIM, f.ruleId)}`);
      lines.push("");
    }
  }

  lines.push(c(DIM, "  " + "─".repeat(44)));
  lines.push(`  ${report.summary}`);
  lines.push("");
  return lines.join("\n");
}

export function formatRulesTable(rules: readonly Rule[], color = false): string {
  const c = (code: string, text: string): string => (color ? `${code}${text}${RESET}` : text);
  const idW = 28;
  const nameW = 38;
  const catW = 20;
  const sevW = 17;

  const lines: string[] = [];
  lines.push("");
  lines.push(
    `  ${c(BOLD, "ID".padEnd(idW))}${c(BOLD, "NAME".padEnd(nameW))}${c(BOLD, "CATEGORY".padEnd(catW))}${c(BOLD, "SEVERITY".padEnd(sevW))}${c(BOLD, "MODE")}`,
  );
  lines.push(`  ${"─".repeat(idW + nameW + catW + sevW + 5)}`);

  for (const rule of rules) {
    lines.push(
      `  ${c(DIM, rule.id.padEnd(idW))}${rule.name.slice(0, nameW - 2).padEnd(nameW)}${rule.category.padEnd(catW)}` +
        `${c(severityColor(rule.severity), rule.severity.padEnd(sevW))}${rule.mode}`,
    );
  }

  lines.push("");
  lines.push(`  ${rules.length} rules total`);
  lines.push("");
  return lines.join("\n");
}
