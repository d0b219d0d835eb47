/**
 * Style extraction: class selectors become CssClass symbols, `@extend` adds
 * class usages and `@import`/`@use`/`@forward` become module requests.
 * `v-bind()` in declaration values references script bindings.
 */

import type { AtRule, Declaration, Document, Node as CssNode, Rule } from "postcss";
import selectorParser from "postcss-selector-parser";
import { logger } from "../logger.js";
import { parseExpression } from "../parsers/script-parser.js";
import type { Span, StyleTree } from "../parsers/source-unit.js";
import { symbolId } from "./types.js";
import { ReferenceWalker, Scope, type UnitContext } from "./script-extractor.js";

/** Pseudo-classes whose argument escapes the component scope. */
const UNSCOPED_PSEUDOS = new Set([":global", ":deep", "::v-deep", ":slotted", "::v-global", "::v-slotted"]);

const HOLE = "\u0000";

/** `v-bind(expr)` with up to two levels of nested parentheses. */
const V_BIND = /v-bind\s*\(((?:[^)(]+|\((?:[^)(]+|\([^)(]*\))*\))*)\)/g;

interface SelectorClass {
  name: string;
  unscoped: boolean;
}

function isRule(node: CssNode | Document | undefined): node is Rule {
  return node?.type === "rule";
}

function isAtRule(node: CssNode | Document | undefined): node is AtRule {
  return node?.type === "atrule";
}

/** Selector list of a rule with SCSS nesting (`&`, `&-suffix`, descendants) flattened. */
function resolveSelectors(rule: Rule, cache: Map<Rule, string[]>): string[] {
  const cached = cache.get(rule);
  if (cached) return cached;

  let parent: CssNode | Document | undefined = rule.parent;
  while (parent && !isRule(parent) && parent.type !== "root" && parent.type !== "document") {
    parent = parent.parent;
  }

  let resolved = rule.selectors;
  if (isRule(parent)) {
    const outer = resolveSelectors(parent, cache);
    resolved = outer.flatMap((p) =>
      rule.selectors.map((s) => (s.includes("&") ? s.replace(/&/g, p) : `${p} ${s}`)),
    );
  }
  cache.set(rule, resolved);
  return resolved;
}

/** Regex extraction for selectors the selector parser rejects (SCSS interpolation). */
function fallbackClasses(selector: string): SelectorClass[] {
  const text = selector.replace(/#\{[^}]*\}/g, HOLE);
  const out: SelectorClass[] = [];
  for (const match of text.matchAll(/\.(-?[_a-zA-Z\u0000][\w\u0000-]*)/g)) {
    const name = match[1];
    if (name === undefined || name.includes(HOLE)) continue;
    out.push({ name, unscoped: /:(?:global|deep)\(/.test(text) });
  }
  return out;
}

export function selectorClasses(selector: string): SelectorClass[] {
  if (selector.includes("#{")) return fallbackClasses(selector);

  const out: SelectorClass[] = [];
  try {
    selectorParser((root) => {
      root.walkClasses((node) => {
        let unscoped = false;
        for (let p = node.parent; p; p = p.parent) {
          if (selectorParser.isPseudo(p) && UNSCOPED_PSEUDOS.has(p.value)) {
            unscoped = true;
            break;
          }
        }
        out.push({ name: node.value, unscoped });
      });
    }).processSync(selector);
  } catch {
    return fallbackClasses(selector);
  }
  return out;
}

/** `"./a.css"`, `url(./a.css)`, `'b' screen` → the path. */
function importPath(params: string): string | null {
  const match = /^(?:url\(\s*)?["']?([^"')\s]+)["']?\s*\)?/.exec(params.trim());
  const path = match?.[1];
  if (!path || /^(?:https?:)?\/\//.test(path) || path.startsWith("sass:")) return null;
  return path;
}

function nodeSpan(node: CssNode, lineOffset: number): Span {
  const start = node.source?.start;
  const end = node.source?.end;
  return {
    line: (start?.line ?? 1) + lineOffset,
    column: start?.column ?? 1,
    endLine: (end?.line ?? start?.line ?? 1) + lineOffset,
  };
}

function extractRule(ctx: UnitContext, style: StyleTree, rule: Rule, cache: Map<Rule, string[]>): void {
  // Keyframe steps are not selectors
  if (isAtRule(rule.parent) && /keyframes$/i.test(rule.parent.name)) return;
  const span = nodeSpan(rule, style.lineOffset);
  for (const selector of resolveSelectors(rule, cache)) {
    for (const { name, unscoped } of selectorClasses(selector)) {
      const scoped = style.scoped && !unscoped;
      const id = symbolId(ctx.unit, scoped ? "scoped-css" : "css", name);
      // The same class in several rules is one declaration
      if (ctx.out.symbols.some((s) => s.id === id)) continue;
      ctx.out.symbols.push({ kind: "CssClass", id, name, unit: ctx.unit, span, visibility: "local", scoped });
    }
  }
}

function extractAtRule(ctx: UnitContext, style: StyleTree, atRule: AtRule): void {
  const span = nodeSpan(atRule, style.lineOffset);
  const name = atRule.name.toLowerCase();

  if (name === "extend") {
    for (const { name: cls } of selectorClasses(atRule.params.replace(/\s*!optional\s*$/, ""))) {
      ctx.out.references.push({ kind: "css-class", name: cls, unit: ctx.unit, span, confidence: "static" });
    }
    return;
  }

  if (name === "import" || name === "use" || name === "forward") {
    const path = importPath(atRule.params);
    if (path) ctx.out.moduleRequests.push({ specifier: path, kind: "css-import", unit: ctx.unit, span, optional: false });
  }
}

/** `'theme.color'` → `theme.color` */
function unquote(expr: string): string {
  const first = expr[0];
  if ((first === "'" || first === '"') && expr.length > 1 && expr.endsWith(first)) return expr.slice(1, -1);
  return expr;
}

function extractDeclaration(ctx: UnitContext, style: StyleTree, decl: Declaration): void {
  if (!decl.value.includes("v-bind")) return;
  const span = nodeSpan(decl, style.lineOffset);
  for (const match of decl.value.matchAll(V_BIND)) {
    const expr = unquote((match[1] ?? "").trim());
    const sourceFile = expr ? parseExpression(expr) : null;
    if (!sourceFile) {
      logger.debug(`${ctx.unit}:${span.line}: v-bind() expression does not parse`);
      continue;
    }
    const walker = new ReferenceWalker(ctx, sourceFile, 0, {
      trackLocals: false,
      fixedSpan: span,
      configStrings: false,
      reportConsole: false,
    });
    walker.walk(sourceFile, new Scope(ctx.moduleScope));
  }
}

export function extractStyle(ctx: UnitContext, style: StyleTree): void {
  const cache = new Map<Rule, string[]>();
  style.root.walk((node) => {
    if (node.type === "rule") extractRule(ctx, style, node, cache);
    else if (node.type === "atrule") extractAtRule(ctx, style, node);
    else if (node.type === "decl") extractDeclaration(ctx, style, node);
  });
}
