/**
 * Pattern scanner: syntax-tree matcher for risky API shapes.
 *
 * Walks the same script and template trees the extractor sees, but shares
 * no state with the usage graph: every unit is scanned on its own. Matching
 * is syntactic. A sanitizer is recognised by callee name only, never by
 * what the function does.
 */

import ts from "typescript";
import {
  NodeTypes,
  type DirectiveNode,
  type TemplateChildNode,
} from "@vue/compiler-dom";
import { createFinding } from "../report/findings.js";
import { parseExpression, rootExpression } from "../parsers/script-parser.js";
import type { SourceUnit, Span } from "../parsers/source-unit.js";
import type { Finding } from "../schemas.js";

export interface ScanOptions {
  /** Callee names whose result is safe to inject as markup. */
  sanitizers: readonly string[];
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

const GLOBAL_OBJECTS = new Set(["window", "globalThis", "self"]);
const TIMER_FUNCTIONS = new Set(["setTimeout", "setInterval"]);
const RAW_HTML_PROPERTIES = new Set(["innerHTML", "outerHTML"]);

function extractSnippet(lines: readonly string[], line: number, contextBefore = 0, contextAfter = 0): string {
  const idx = line - 1;
  const start = Math.max(0, idx - contextBefore);
  const end = Math.min(lines.length - 1, idx + contextAfter);
  return lines.slice(start, end + 1).join("\n");
}

/** `a.b.c` for identifier/property chains, null for anything else. */
export function dottedName(expr: ts.Expression): string | null {
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr)) {
    const head = dottedName(expr.expression);
    return head === null ? null : `${head}.${expr.name.text}`;
  }
  return null;
}

function unwrap(expr: ts.Expression): ts.Expression {
  let current = expr;
  while (ts.isParenthesizedExpression(current) || ts.isAsExpression(current) || ts.isNonNullExpression(current)) {
    current = current.expression;
  }
  return current;
}

/** `eval`, `window.eval`, `globalThis.eval`, `self.eval`. */
function isEvalCallee(expr: ts.Expression): boolean {
  const callee = unwrap(expr);
  if (ts.isIdentifier(callee)) return callee.text === "eval";
  return (
    ts.isPropertyAccessExpression(callee) &&
    callee.name.text === "eval" &&
    ts.isIdentifier(callee.expression) &&
    GLOBAL_OBJECTS.has(callee.expression.text)
  );
}

function timerName(expr: ts.Expression): string | null {
  const callee = unwrap(expr);
  if (ts.isIdentifier(callee)) return TIMER_FUNCTIONS.has(callee.text) ? callee.text : null;
  if (
    ts.isPropertyAccessExpression(callee) &&
    ts.isIdentifier(callee.expression) &&
    GLOBAL_OBJECTS.has(callee.expression.text) &&
    TIMER_FUNCTIONS.has(callee.name.text)
  ) {
    return callee.name.text;
  }
  return null;
}

function isStringish(expr: ts.Expression): boolean {
  const node = unwrap(expr);
  if (ts.isStringLiteralLike(node) || ts.isTemplateExpression(node)) return true;
  if (ts.isBinaryExpression(node) && node.operatorToken.kind === ts.SyntaxKind.PlusToken) {
    return isStringish(node.left) || isStringish(node.right);
  }
  return false;
}

/**
 * Whether the bound expression is a call to an allow-listed sanitizer.
 * Entries with a dot match the full callee path; bare names match the last
 * segment, so `sanitize` covers `utils.sanitize`.
 */
export function isSanitized(expr: ts.Expression, sanitizers: readonly string[]): boolean {
  const node = unwrap(expr);
  if (!ts.isCallExpression(node)) return false;
  const name = dottedName(node.expression);
  if (name === null) return false;
  const last = name.slice(name.lastIndexOf(".") + 1);
  return sanitizers.some((entry) => (entry.includes(".") ? entry === name : entry === last));
}

/** Names in the tree bound to a string value: `const code = "…"`. */
function stringBindings(sourceFile: ts.SourceFile): Set<string> {
  const names = new Set<string>();
  const visit = (node: ts.Node): void => {
    if (ts.isVariableDeclaration(node) && ts.isIdentifier(node.name) && node.initializer && isStringish(node.initializer)) {
      names.add(node.name.text);
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return names;
}

/* ------------------------------------------------------------------ */
/*  Scanner                                                           */
/* ------------------------------------------------------------------ */

type VulnRuleId = "vuln-eval" | "vuln-raw-html" | "vuln-string-timer";

interface Match {
  ruleId: VulnRuleId;
  span: Span;
  description: string;
}

class UnitScanner {
  readonly matches: Match[] = [];
  private readonly stringNames = new Set<string>();

  constructor(
    unit: SourceUnit,
    private readonly options: ScanOptions,
  ) {
    for (const script of unit.scripts) {
      for (const name of stringBindings(script.sourceFile)) this.stringNames.add(name);
    }
  }

  private push(ruleId: VulnRuleId, span: Span, description: string): void {
    this.matches.push({ ruleId, span, description });
  }

  /**
   * Whether a timer callback may be code. Function literals, identifiers not
   * bound to a string and `fn.bind(…)` are functions. A dotted read such as
   * `this.tick` is taken as a method reference; `handlers[name]` and any
   * other computed value is not.
   */
  private timerArgumentIsCode(arg: ts.Expression): boolean {
    const node = unwrap(arg);
    if (isStringish(node)) return true;
    if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) return false;
    if (ts.isIdentifier(node)) return this.stringNames.has(node.text);
    if (ts.isPropertyAccessExpression(node)) return false;
    if (ts.isConditionalExpression(node)) {
      return this.timerArgumentIsCode(node.whenTrue) || this.timerArgumentIsCode(node.whenFalse);
    }
    if (
      ts.isBinaryExpression(node) &&
      (node.operatorToken.kind === ts.SyntaxKind.BarBarToken ||
        node.operatorToken.kind === ts.SyntaxKind.QuestionQuestionToken)
    ) {
      return this.timerArgumentIsCode(node.left) || this.timerArgumentIsCode(node.right);
    }
    if (ts.isCallExpression(node)) {
      const callee = unwrap(node.expression);
      return !(ts.isPropertyAccessExpression(callee) && callee.name.text === "bind");
    }
    return true;
  }

  /**
   * Scan one script tree (or one template expression when `fixedSpan` is
   * given).
   */
  scanTree(sourceFile: ts.SourceFile, lineOffset: number, fixedSpan?: Span): void {
    const spanOf = (node: ts.Node): Span => {
      if (fixedSpan) return fixedSpan;
      const start = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
      const end = sourceFile.getLineAndCharacterOfPosition(node.getEnd());
      return { line: start.line + 1 + lineOffset, column: start.character + 1, endLine: end.line + 1 + lineOffset };
    };

    const visit = (node: ts.Node): void => {
      if (ts.isCallExpression(node)) {
        if (isEvalCallee(node.expression)) {
          this.push("vuln-eval", spanOf(node), "eval() executes a string as code");
        }

        const timer = timerName(node.expression);
        const first = node.arguments[0];
        if (timer && first && this.timerArgumentIsCode(first)) {
          this.push("vuln-string-timer", spanOf(node), `${timer}() called with a string or computed code; it is evaluated as code`);
        }

        const callee = unwrap(node.expression);
        if (ts.isPropertyAccessExpression(callee) && callee.name.text === "insertAdjacentHTML") {
          const markup = node.arguments[1];
          if (markup && !isSanitized(markup, this.options.sanitizers)) {
            this.push("vuln-raw-html", spanOf(node), "insertAdjacentHTML() with unsanitized markup");
          }
        }
      }

      if (ts.isNewExpression(node) && ts.isIdentifier(node.expression) && node.expression.text === "Function") {
        this.push("vuln-eval", spanOf(node), "The Function constructor executes a string as code");
      }

      if (
        ts.isBinaryExpression(node) &&
        node.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
        ts.isPropertyAccessExpression(node.left) &&
        RAW_HTML_PROPERTIES.has(node.left.name.text) &&
        !isSanitized(node.right, this.options.sanitizers)
      ) {
        this.push("vuln-raw-html", spanOf(node), `Assignment to ${node.left.name.text} with unsanitized markup`);
      }

      if (ts.isJsxAttribute(node) && node.name.getText(sourceFile) === "dangerouslySetInnerHTML") {
        const init = node.initializer;
        const value = init && ts.isJsxExpression(init) ? init.expression : undefined;
        if (value && !this.isSafeHtmlObject(value)) {
          this.push("vuln-raw-html", spanOf(node), "dangerouslySetInnerHTML with unsanitized markup");
        }
      }

      ts.forEachChild(node, visit);
    };

    visit(sourceFile);
  }

  /** `{ __html: sanitize(x) }` */
  private isSafeHtmlObject(expr: ts.Expression): boolean {
    const node = unwrap(expr);
    if (!ts.isObjectLiteralExpression(node)) return false;
    for (const prop of node.properties) {
      if (ts.isPropertyAssignment(prop) && ts.isIdentifier(prop.name) && prop.name.text === "__html") {
        return isSanitized(prop.initializer, this.options.sanitizers);
      }
    }
    return false;
  }

  private directive(dir: DirectiveNode, lineOffset: number): void {
    const exp = dir.exp;
    if (!exp || exp.type !== NodeTypes.SIMPLE_EXPRESSION || !exp.content.trim()) return;

    const span: Span = {
      line: dir.loc.start.line + lineOffset,
      column: dir.loc.start.column,
      endLine: dir.loc.end.line + lineOffset,
    };
    const sourceFile = parseExpression(exp.content.trim(), dir.name === "on" ? "statements" : "expression");
    if (!sourceFile) return;

    this.scanTree(sourceFile, 0, span);

    const arg = dir.arg;
    const argName = arg && arg.type === NodeTypes.SIMPLE_EXPRESSION && arg.isStatic ? arg.content : null;
    const injectsHtml =
      dir.name === "html" || (dir.name === "bind" && (argName === "innerHTML" || argName === "inner-html"));
    if (!injectsHtml) return;

    const root = rootExpression(sourceFile);
    if (root && !isSanitized(root, this.options.sanitizers)) {
      this.push("vuln-raw-html", span, `${dir.name === "html" ? "v-html" : ":innerHTML"} binds unsanitized markup`);
    }
  }

  scanTemplate(node: TemplateChildNode, lineOffset: number): void {
    if (node.type === NodeTypes.INTERPOLATION) {
      const content = node.content.type === NodeTypes.SIMPLE_EXPRESSION ? node.content.content.trim() : "";
      const sourceFile = content ? parseExpression(content) : null;
      if (sourceFile) {
        this.scanTree(sourceFile, 0, {
          line: node.loc.start.line + lineOffset,
          column: node.loc.start.column,
          endLine: node.loc.end.line + lineOffset,
        });
      }
      return;
    }
    if (node.type !== NodeTypes.ELEMENT) return;
    for (const prop of node.props) {
      if (prop.type === NodeTypes.DIRECTIVE) this.directive(prop, lineOffset);
    }
    for (const child of node.children) this.scanTemplate(child, lineOffset);
  }
}

/**
 * Scan one parsed unit. Pure: the result depends only on the unit and the
 * options.
 */
export function scanUnit(unit: SourceUnit, options: ScanOptions): Finding[] {
  const scanner = new UnitScanner(unit, options);
  for (const script of unit.scripts) scanner.scanTree(script.sourceFile, script.lineOffset);
  if (unit.template) {
    for (const child of unit.template.root.children) scanner.scanTemplate(child, unit.template.lineOffset);
  }

  const lines = unit.text.split("\n");
  return scanner.matches.map((m) =>
    createFinding(m.ruleId, {
      filePath: unit.path,
      startLine: m.span.line,
      endLine: m.span.endLine,
      column: m.span.column,
      description: m.description,
      codeSnippet: extractSnippet(lines, m.span.line),
    }),
  );
}
