/**
 * Dead-code and unused-asset reporter.
 *
 * A symbol is dead when no static edge reaches it. Dynamic-only symbols are
 * reported as possibly unused, never dropped and never treated as live.
 */

import type { SymbolRecord } from "../extract/types.js";
import type { Dialect } from "../parsers/source-unit.js";
import type { UsageGraph } from "../graph/usage-graph.js";
import { unitNode } from "../graph/usage-graph.js";
import type { Finding } from "../schemas.js";
import { createFinding } from "./findings.js";

export type Liveness = "live" | "unused" | "possibly-unused";

export function livenessOf(graph: UsageGraph, id: string): Liveness {
  const incoming = graph.incoming(id);
  if (incoming.static > 0) return "live";
  return incoming.dynamic > 0 ? "possibly-unused" : "unused";
}

const RULE_BY_KIND: Record<Exclude<SymbolRecord["kind"], "PackageDependency">, string> = {
  ImportBinding: "clean-unused-import",
  ExportBinding: "clean-unused-export",
  Variable: "clean-unused-variable",
  Function: "clean-unused-function",
  CssClass: "clean-unused-css-class",
};

function describe(symbol: SymbolRecord, liveness: Exclude<Liveness, "live">): string {
  if (liveness === "possibly-unused") {
    if (symbol.kind === "CssClass") {
      return `Class '.${symbol.name}' is only matched by a dynamic class expression (verify manually)`;
    }
    return `'${symbol.name}' is only referenced dynamically (verify manually)`;
  }

  switch (symbol.kind) {
    case "ImportBinding":
      return `'${symbol.name}' is imported from '${symbol.specifier}' but never used`;
    case "ExportBinding":
      return symbol.target.type === "component"
        ? "Component is never imported"
        : `'${symbol.name}' is exported but never imported`;
    case "Variable":
      return `'${symbol.name}' is declared but never used`;
    case "Function":
      return `Function '${symbol.name}' is declared but never called`;
    case "CssClass":
      return `Class '.${symbol.name}' is never used`;
    case "PackageDependency":
      return `'${symbol.name}' is never imported`;
  }
}

export interface DeadCodeInput {
  graph: UsageGraph;
  /** Source text per unit, for snippets. */
  texts: ReadonlyMap<string, string>;
}

export function reportDeadCode({ graph, texts }: DeadCodeInput): Finding[] {
  const lineCache = new Map<string, string[]>();
  const snippet = (unit: string, line: number): string => {
    let lines = lineCache.get(unit);
    if (!lines) {
      lines = (texts.get(unit) ?? "").split("\n");
      lineCache.set(unit, lines);
    }
    return lines[line - 1]?.trim() ?? "";
  };

  const findings: Finding[] = [];
  for (const symbol of graph.symbols.values()) {
    if (symbol.kind === "PackageDependency") continue;
    const liveness = livenessOf(graph, symbol.id);
    if (liveness === "live") continue;

    findings.push(
      createFinding(RULE_BY_KIND[symbol.kind], {
        filePath: symbol.unit,
        startLine: symbol.span.line,
        endLine: symbol.span.endLine,
        column: symbol.span.column,
        symbol: symbol.name,
        severity: liveness,
        description: describe(symbol, liveness),
        codeSnippet: snippet(symbol.unit, symbol.span.line),
      }),
    );
  }
  return findings;
}

export interface UnreachableInput {
  units: ReadonlyArray<{ path: string; dialect: Dialect }>;
  reachable: ReadonlySet<string>;
  hasEntries: boolean;
}

/** Script and component units no entry point reaches. */
export function reportUnreachableModules({ units, reachable, hasEntries }: UnreachableInput): Finding[] {
  if (!hasEntries) return [];
  return units
    .filter((u) => u.dialect !== "stylesheet" && !reachable.has(unitNode(u.path)))
    .map((u) =>
      createFinding("clean-unreachable-module", {
        filePath: u.path,
        startLine: 1,
        description: "No entry point reaches this module",
      }),
    );
}
