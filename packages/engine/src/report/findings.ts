/**
 * Finding construction, de-duplication and ordering.
 */

import { getRule } from "../rules/registry.js";
import { FindingSchema, type Finding, type Severity } from "../schemas.js";

export interface FindingInput {
  filePath: string;
  startLine: number;
  endLine?: number;
  column?: number;
  description: string;
  rationale?: string;
  symbol?: string;
  codeSnippet?: string;
  /** Overrides the rule's default severity. */
  severity?: Severity;
  /** Overrides the rule's name. */
  title?: string;
}

/** Throws on an unknown rule id or a malformed position. */
export function createFinding(ruleId: string, input: FindingInput): Finding {
  const rule = getRule(ruleId);
  return FindingSchema.parse({
    ruleId,
    category: rule.category,
    severity: input.severity ?? rule.severity,
    title: input.title ?? rule.name,
    description: input.description,
    filePath: input.filePath,
    startLine: input.startLine,
    endLine: input.endLine ?? input.startLine,
    column: input.column ?? 0,
    symbol: input.symbol,
    codeSnippet: input.codeSnippet ?? "",
    rationale: input.rationale ?? rule.description,
  });
}

function findingKey(f: Finding): string {
  return `${f.filePath}:${f.startLine}:${f.column}:${f.ruleId}:${f.symbol ?? ""}`;
}

/**
 * Deduplicate findings: same file, position, rule and symbol.
 * When two collide the first one wins.
 */
export function dedupeFindings(findings: Finding[]): Finding[] {
  const seen = new Map<string, Finding>();
  for (const f of findings) {
    const key = findingKey(f);
    if (!seen.has(key)) seen.set(key, f);
  }
  return [...seen.values()];
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Deterministic order: file, line, column, rule, symbol, description.
 * Plain code-unit comparison so the order never depends on the host locale.
 */
export function sortFindings(findings: Finding[]): Finding[] {
  return findings.slice().sort((a, b) =>
    compareStrings(a.filePath, b.filePath) ||
    a.startLine - b.startLine ||
    a.column - b.column ||
    compareStrings(a.ruleId, b.ruleId) ||
    compareStrings(a.symbol ?? "", b.symbol ?? "") ||
    compareStrings(a.description, b.description),
  );
}
