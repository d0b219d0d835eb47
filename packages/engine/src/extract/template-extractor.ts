/**
 * Template extraction: component tags, directive and interpolation
 * expressions, and class attributes. Names resolve against the unit's
 * module scope, which the script blocks populated, shadowed by `v-for`
 * aliases and slot props inside the elements that declare them.
 */

import {
  NodeTypes,
  type AttributeNode,
  type DirectiveNode,
  type ElementNode,
  type ExpressionNode,
  type TemplateChildNode,
} from "@vue/compiler-dom";
import ts from "typescript";
import { logger } from "../logger.js";
import { parseExpression, rootExpression } from "../parsers/script-parser.js";
import type { Span, TemplateTree } from "../parsers/source-unit.js";
import { evaluateClassBinding, splitClassList } from "./class-binding.js";
import { ReferenceWalker, Scope, bindingIdentifiers, type UnitContext } from "./script-extractor.js";

const BUILTIN_DIRECTIVES = new Set([
  "bind", "on", "if", "else-if", "else", "for", "show", "model",
  "html", "text", "slot", "once", "memo", "cloak", "pre", "is",
]);

/** `alias in source`, `(item, index) of source` */
const FOR_ALIAS = /^([\s\S]*?)\s+(?:in|of)\s+(\S[\s\S]*)$/;

/** Attribute names that take a class list: `class`, `active-class`, `enterActiveClass`… */
const CLASS_ATTRIBUTE = /class$/i;

interface SourceLocationLike {
  start: { line: number; column: number };
  end: { line: number };
}

function toPascal(name: string): string {
  return name.replace(/(?:^|-)(\w)/g, (_m, c: string) => c.toUpperCase());
}

function toCamel(name: string): string {
  return name.replace(/-(\w)/g, (_m, c: string) => c.toUpperCase());
}

function expressionContent(node: ExpressionNode | undefined): string | null {
  if (!node || node.type !== NodeTypes.SIMPLE_EXPRESSION) return null;
  return node.content;
}

class TemplateExtractor {
  constructor(
    private readonly ctx: UnitContext,
    private readonly lineOffset: number,
  ) {}

  private span(loc: SourceLocationLike): Span {
    return {
      line: loc.start.line + this.lineOffset,
      column: loc.start.column,
      endLine: loc.end.line + this.lineOffset,
    };
  }

  /** Parse an expression and record what it references. Returns the walker for follow-up records. */
  private expression(
    source: string,
    loc: SourceLocationLike,
    scope: Scope,
    mode: "expression" | "statements" = "expression",
  ): { walker: ReferenceWalker; root: ReturnType<typeof rootExpression> } | null {
    const trimmed = source.trim();
    if (!trimmed) return null;
    const sourceFile = parseExpression(trimmed, mode);
    if (!sourceFile) {
      logger.debug(`${this.ctx.unit}:${loc.start.line + this.lineOffset}: template expression does not parse`);
      return null;
    }
    const walker = new ReferenceWalker(this.ctx, sourceFile, 0, {
      trackLocals: false,
      fixedSpan: this.span(loc),
      configStrings: false,
      reportConsole: false,
    });
    walker.walk(sourceFile, new Scope(scope));
    return { walker, root: mode === "expression" ? rootExpression(sourceFile) : null };
  }

  /**
   * Child scope binding the names of a `v-for` alias or a slot-props
   * pattern. Defaults inside the pattern are recorded as references.
   */
  private bindPattern(pattern: string, loc: SourceLocationLike, scope: Scope): Scope {
    const inner = new Scope(scope);
    const parsed = this.expression(`(${pattern}) => 0`, loc, scope);
    const fn = parsed?.root;
    if (!fn || !ts.isArrowFunction(fn)) return inner;
    for (const param of fn.parameters) {
      for (const id of bindingIdentifiers(param.name)) inner.bind(id.text, null);
    }
    return inner;
  }

  /** `<FooBar>`, `<foo-bar>` and `<Foo.Bar>` name script bindings. */
  private componentTag(element: ElementNode, scope: Scope): void {
    const tag = element.tag.split(".")[0];
    if (!tag || (!tag.includes("-") && !/^[A-Z]/.test(tag))) return;

    for (const candidate of new Set([tag, toCamel(tag), toPascal(tag)])) {
      const target = scope.lookup(candidate);
      if (!target) continue;
      this.ctx.out.references.push({
        kind: "identifier",
        name: candidate,
        unit: this.ctx.unit,
        span: this.span(element.loc),
        confidence: "static",
        resolvedId: target,
      });
      return;
    }
  }

  private attribute(attr: AttributeNode): void {
    if (!CLASS_ATTRIBUTE.test(attr.name) || !attr.value) return;
    const span = this.span(attr.loc);
    for (const name of splitClassList(attr.value.content)) {
      this.ctx.out.references.push({ kind: "css-class", name, unit: this.ctx.unit, span, confidence: "static" });
    }
  }

  private directive(dir: DirectiveNode, scope: Scope): void {
    const arg = dir.arg;
    if (arg && arg.type === NodeTypes.SIMPLE_EXPRESSION && !arg.isStatic) {
      this.expression(arg.content, arg.loc, scope);
    }

    // Custom directives: `v-focus` uses a `vFocus` binding
    if (!BUILTIN_DIRECTIVES.has(dir.name)) {
      const name = `v${toPascal(dir.name)}`;
      const target = scope.lookup(name);
      if (target) {
        this.ctx.out.references.push({
          kind: "identifier",
          name,
          unit: this.ctx.unit,
          span: this.span(dir.loc),
          confidence: "static",
          resolvedId: target,
        });
      }
    }

    const content = expressionContent(dir.exp);
    if (content === null) return;

    switch (dir.name) {
      case "slot":
      case "for":
        // Binding patterns; `visit` handles them
        return;
      case "on":
        this.expression(content, dir.loc, scope, "statements");
        return;
      case "bind": {
        const parsed = this.expression(content, dir.loc, scope);
        const argName = arg && arg.type === NodeTypes.SIMPLE_EXPRESSION && arg.isStatic ? arg.content : null;
        if (parsed?.root && argName !== null && CLASS_ATTRIBUTE.test(argName)) {
          parsed.walker.recordClassTokens(evaluateClassBinding(parsed.root), parsed.root);
        }
        return;
      }
      default:
        this.expression(content, dir.loc, scope);
    }
  }

  /** The scope for an element's props after its `v-for`, if any. */
  private forScope(element: ElementNode, scope: Scope): Scope {
    for (const prop of element.props) {
      if (prop.type !== NodeTypes.DIRECTIVE || prop.name !== "for") continue;
      const match = FOR_ALIAS.exec(expressionContent(prop.exp)?.trim() ?? "");
      const alias = match?.[1]?.trim();
      const source = match?.[2];
      if (alias === undefined || source === undefined) return scope;
      // The source is evaluated outside the loop
      this.expression(source, prop.loc, scope);
      const params = alias.startsWith("(") && alias.endsWith(")") ? alias.slice(1, -1) : alias;
      return params ? this.bindPattern(params, prop.loc, scope) : scope;
    }
    return scope;
  }

  /** The scope for an element's children after its `v-slot` props, if any. */
  private slotScope(element: ElementNode, scope: Scope): Scope {
    for (const prop of element.props) {
      if (prop.type !== NodeTypes.DIRECTIVE || prop.name !== "slot") continue;
      const pattern = expressionContent(prop.exp)?.trim();
      return pattern ? this.bindPattern(pattern, prop.loc, scope) : scope;
    }
    return scope;
  }

  visit(node: TemplateChildNode, scope: Scope): void {
    if (node.type === NodeTypes.INTERPOLATION) {
      const content = expressionContent(node.content);
      if (content !== null) this.expression(content, node.loc, scope);
      return;
    }
    if (node.type !== NodeTypes.ELEMENT) return;

    const own = this.forScope(node, scope);
    this.componentTag(node, own);
    for (const prop of node.props) {
      if (prop.type === NodeTypes.ATTRIBUTE) this.attribute(prop);
      else this.directive(prop, own);
    }
    const inner = this.slotScope(node, own);
    for (const child of node.children) this.visit(child, inner);
  }
}

export function extractTemplate(ctx: UnitContext, template: TemplateTree): void {
  const extractor = new TemplateExtractor(ctx, template.lineOffset);
  for (const child of template.root.children) extractor.visit(child, ctx.moduleScope);
}
