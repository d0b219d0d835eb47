/**
 * Script parsing with the TypeScript compiler API.
 *
 * Handles JS/TS/JSX/TSX with one parser. Syntax errors are reported through
 * `transpileModule`, which runs only the syntactic checks.
 */

import ts from "typescript";
import { ParseError } from "../errors.js";
import type { ScriptLang } from "./source-unit.js";

const SCRIPT_KIND: Record<ScriptLang, ts.ScriptKind> = {
  ts: ts.ScriptKind.TS,
  tsx: ts.ScriptKind.TSX,
  js: ts.ScriptKind.JS,
  jsx: ts.ScriptKind.JSX,
};

function syntheticName(unitPath: string, lang: ScriptLang): string {
  return unitPath.endsWith(`.${lang}`) ? unitPath : `${unitPath}.${lang}`;
}

/**
 * First syntax error in `text`, or null when it parses cleanly.
 */
export function findSyntaxError(
  fileName: string,
  text: string,
): { line: number; column: number; message: string } | null {
  const output = ts.transpileModule(text, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.Latest,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true,
    },
  });

  for (const diag of output.diagnostics ?? []) {
    if (diag.category !== ts.DiagnosticCategory.Error || !diag.file) continue;
    const pos = diag.file.getLineAndCharacterOfPosition(diag.start ?? 0);
    return {
      line: pos.line + 1,
      column: pos.character + 1,
      message: ts.flattenDiagnosticMessageText(diag.messageText, "\n"),
    };
  }
  return null;
}

/**
 * Parse a script subtree. `lineOffset` only shifts the position reported in
 * a ParseError; the returned tree keeps tree-local positions.
 */
export function parseScript(
  unitPath: string,
  text: string,
  lang: ScriptLang,
  lineOffset = 0,
): ts.SourceFile {
  const fileName = syntheticName(unitPath, lang);
  const error = findSyntaxError(fileName, text);
  if (error) {
    throw new ParseError(unitPath, { line: error.line + lineOffset, column: error.column }, error.message);
  }
  return ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, SCRIPT_KIND[lang]);
}

/**
 * Parse a template expression (`:class`, `{{ }}`, `v-if`…). Statement mode is
 * for `v-on` handlers, which may hold several statements.
 *
 * Returns null when the expression does not parse; template expressions are
 * best-effort and never fail the unit on their own.
 */
export function parseExpression(
  source: string,
  mode: "expression" | "statements" = "expression",
): ts.SourceFile | null {
  const text = mode === "expression" ? `(${source});` : source;
  const fileName = "__expr.tsx";
  if (findSyntaxError(fileName, text)) return null;
  return ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TSX);
}

/** The root expression of a tree produced by `parseExpression(…, "expression")`. */
export function rootExpression(sourceFile: ts.SourceFile): ts.Expression | null {
  const first = sourceFile.statements[0];
  if (!first || !ts.isExpressionStatement(first)) return null;
  let expr: ts.Expression = first.expression;
  if (ts.isParenthesizedExpression(expr)) expr = expr.expression;
  return expr;
}

