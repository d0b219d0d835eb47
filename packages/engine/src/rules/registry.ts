/**
 * Rule registry.
 *
 * Central catalogue of every rule the engine can report. Findings take their
 * title and default severity from here; config validates `disable` against it.
 */

import type { Category, RunMode, Severity } from "../schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Rule {
  id: string;
  name: string;
  description: string;
  category: Category;
  /** Which run mode produces it. Processing errors show up in both. */
  mode: RunMode | "both";
  severity: Severity;
  enabled: boolean;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

const cleanRules: Rule[] = [
  {
    id: "clean-unused-import",
    name: "Unused import",
    description: "An imported binding that nothing in the unit (script, template or style) references.",
    category: "UnusedImport",
    mode: "clean",
    severity: "unused",
    enabled: true,
  },
  {
    id: "clean-unused-export",
    name: "Unused export",
    description: "An export that no unit imports, directly or through a re-export chain, and that is not an entry point.",
    category: "UnusedExport",
    mode: "clean",
    severity: "unused",
    enabled: true,
  },
  {
    id: "clean-unused-variable",
    name: "Unused variable",
    description: "A module-scope variable, class or enum that is never referenced.",
    category: "UnusedVariable",
    mode: "clean",
    severity: "unused",
    enabled: true,
  },
  {
    id: "clean-unused-function",
    name: "Unused function",
    description: "A module-scope function declaration that is never referenced.",
    category: "UnusedFunction",
    mode: "clean",
    severity: "unused",
    enabled: true,
  },
  {
    id: "clean-unused-css-class",
    name: "Unused CSS class",
    description: "A class selector declared in a style block or stylesheet that no markup class attribute or binding uses.",
    category: "UnusedCssClass",
    mode: "clean",
    severity: "unused",
    enabled: true,
  },
  {
    id: "clean-unused-package",
    name: "Unused package",
    description: "A runtime dependency declared in package.json that no unit imports.",
    category: "UnusedPackage",
    mode: "clean",
    severity: "unused",
    enabled: true,
  },
  {
    id: "clean-unreachable-module",
    name: "Unreachable module",
    description: "A file that is never loaded, transitively, from any entry point.",
    category: "UnreachableModule",
    mode: "clean",
    severity: "info",
    enabled: true,
  },
  {
    id: "clean-console-statement",
    name: "Console statement",
    description: "A console.log / warn / error / info / debug call left in source.",
    category: "ConsoleStatement",
    mode: "clean",
    severity: "low",
    enabled: true,
  },
];

const vulnRules: Rule[] = [
  {
    id: "vuln-eval",
    name: "Use of eval()",
    description: "Direct call to eval(). Executes arbitrary strings as code and can lead to remote code execution.",
    category: "Vulnerability",
    mode: "vuln",
    severity: "critical",
    enabled: true,
  },
  {
    id: "vuln-raw-html",
    name: "Unescaped HTML binding",
    description:
      "v-html, an innerHTML binding or dangerouslySetInnerHTML renders raw markup (XSS vector). " +
      "A call to an allow-listed sanitizer is accepted; the check matches callee names only.",
    category: "Vulnerability",
    mode: "vuln",
    severity: "high",
    enabled: true,
  },
  {
    id: "vuln-string-timer",
    name: "Timer with string or computed callback",
    description: "setTimeout/setInterval whose first argument is a string or a computed value that is not known to be a function.",
    category: "Vulnerability",
    mode: "vuln",
    severity: "medium",
    enabled: true,
  },
  {
    id: "vuln-known-vulnerability",
    name: "Known vulnerable dependency",
    description: "A declared dependency version matches an advisory in the vulnerability database.",
    category: "KnownVulnerability",
    mode: "vuln",
    severity: "high",
    enabled: true,
  },
  {
    id: "vuln-audit-unavailable",
    name: "Dependency audit unavailable",
    description: "The vulnerability database could not be queried (network error or timeout).",
    category: "AuditUnavailable",
    mode: "vuln",
    severity: "info",
    enabled: true,
  },
];

const systemRules: Rule[] = [
  {
    id: "sys-parse-error",
    name: "Parse error",
    description: "The unit could not be parsed and was skipped.",
    category: "ParseError",
    mode: "both",
    severity: "low",
    enabled: true,
  },
  {
    id: "sys-unresolved-import",
    name: "Unresolved import",
    description: "An import names a file or export that does not exist in the project.",
    category: "UnresolvedImport",
    mode: "clean",
    severity: "low",
    enabled: true,
  },
];

const ALL_RULES: Rule[] = [...cleanRules, ...vulnRules, ...systemRules];

const RULES_BY_ID = new Map(ALL_RULES.map((r) => [r.id, r]));

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Returns every registered rule.
 */
export function getAllRules(): Rule[] {
  return ALL_RULES;
}

export function getRulesForMode(mode: RunMode): Rule[] {
  return ALL_RULES.filter((rule) => rule.mode === mode || rule.mode === "both");
}

export function getRule(id: string): Rule {
  const rule = RULES_BY_ID.get(id);
  if (!rule) throw new Error(`Unknown rule '${id}'`);
  return rule;
}
