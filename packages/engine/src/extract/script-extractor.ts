/**
 * Script extraction.
 *
 * Two passes per unit. `declareTopLevel` records module-scope declarations
 * (imports, exports, variables, functions) for every script tree first, so
 * `<script>` and `<script setup>` share one scope. `ReferenceWalker` then walks
 * the trees with a lexical scope chain and records every name it can resolve.
 */

import ts from "typescript";
import { logger } from "../logger.js";
import { createFinding } from "../report/findings.js";
import { isFrameworkConfig } from "../parsers/file-classifier.js";
import type { ScriptTree, Span } from "../parsers/source-unit.js";
import { evaluateClassBinding, type ClassToken } from "./class-binding.js";
import {
  symbolId,
  type ExportTarget,
  type ModuleRequestKind,
  type SymbolRecord,
  type UnitExtraction,
} from "./types.js";

export interface ExtractOptions {
  /** Record block-scoped locals as Variable/Function symbols. */
  reportBlockScoped: boolean;
  /** Emit console-statement findings. */
  reportConsole: boolean;
}

// ---------------------------------------------------------------------------
// Scopes
// ---------------------------------------------------------------------------

/**
 * One lexical scope. A binding maps to the symbol id it declares, or to null
 * for names that shadow outer ones without being tracked (parameters, catch
 * variables, untracked locals).
 */
export class Scope {
  private readonly bindings = new Map<string, string | null>();

  constructor(readonly parent: Scope | null) {}

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  bind(name: string, id: string | null): void {
    this.bindings.set(name, id);
  }

  /** Symbol id, null for an untracked binding, undefined for a global. */
  lookup(name: string): string | null | undefined {
    for (let scope: Scope | null = this; scope; scope = scope.parent) {
      if (scope.bindings.has(name)) return scope.bindings.get(name) ?? null;
    }
    return undefined;
  }
}

export interface UnitContext {
  unit: string;
  out: UnitExtraction;
  /** Module scope shared by all script trees and the template. */
  moduleScope: Scope;
  /** Ids of namespace import bindings. */
  namespaceIds: Set<string>;
  options: ExtractOptions;
}

export function createUnitContext(out: UnitExtraction, options: ExtractOptions): UnitContext {
  return { unit: out.unit, out, moduleScope: new Scope(null), namespaceIds: new Set(), options };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CONSOLE_METHODS = new Set(["log", "warn", "error", "info", "debug"]);
const CLASS_LIST_METHODS = new Set(["add", "remove", "toggle", "contains", "replace"]);

export function spanOf(node: ts.Node, sourceFile: ts.SourceFile, lineOffset: number): Span {
  const start = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
  const end = sourceFile.getLineAndCharacterOfPosition(node.getEnd());
  return {
    line: start.line + 1 + lineOffset,
    column: start.character + 1,
    endLine: end.line + 1 + lineOffset,
  };
}

export function bindingIdentifiers(name: ts.BindingName): ts.Identifier[] {
  if (ts.isIdentifier(name)) return [name];
  const out: ts.Identifier[] = [];
  for (const element of name.elements) {
    if (ts.isOmittedExpression(element)) continue;
    out.push(...bindingIdentifiers(element.name));
  }
  return out;
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

type FunctionLike =
  | ts.FunctionDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

function isFunctionLike(node: ts.Node): node is FunctionLike {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  );
}

function isBlockScopedList(list: ts.VariableDeclarationList): boolean {
  return (list.flags & ts.NodeFlags.BlockScoped) !== 0;
}

/**
 * Whether an identifier is a use of a binding rather than a declaration name,
 * a property name or a label.
 */
export function isReferencePosition(id: ts.Identifier): boolean {
  const parent = id.parent;
  if (!parent) return true;

  if (ts.isPropertyAccessExpression(parent)) return parent.expression === id;
  if (ts.isQualifiedName(parent)) return parent.left === id;
  if (ts.isShorthandPropertyAssignment(parent)) return true;
  if (ts.isBindingElement(parent)) return parent.initializer === id;
  if (ts.isJsxAttribute(parent)) return false;
  if (ts.isJsxClosingElement(parent)) return false;
  if (ts.isJsxOpeningElement(parent) || ts.isJsxSelfClosingElement(parent)) {
    return /^[A-Z]/.test(id.text);
  }
  if (ts.isExportAssignment(parent)) return parent.expression !== id;

  if (
    ts.isImportSpecifier(parent) ||
    ts.isImportClause(parent) ||
    ts.isNamespaceImport(parent) ||
    ts.isImportEqualsDeclaration(parent) ||
    ts.isExportSpecifier(parent) ||
    ts.isNamespaceExport(parent) ||
    ts.isLabeledStatement(parent) ||
    ts.isBreakOrContinueStatement(parent) ||
    ts.isMetaProperty(parent)
  ) {
    return false;
  }

  if (
    ts.isVariableDeclaration(parent) ||
    ts.isParameter(parent) ||
    ts.isFunctionDeclaration(parent) ||
    ts.isFunctionExpression(parent) ||
    ts.isClassDeclaration(parent) ||
    ts.isClassExpression(parent) ||
    ts.isInterfaceDeclaration(parent) ||
    ts.isTypeAliasDeclaration(parent) ||
    ts.isEnumDeclaration(parent) ||
    ts.isEnumMember(parent) ||
    ts.isModuleDeclaration(parent) ||
    ts.isTypeParameterDeclaration(parent) ||
    ts.isPropertyAssignment(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isPropertySignature(parent) ||
    ts.isMethodDeclaration(parent) ||
    ts.isMethodSignature(parent) ||
    ts.isGetAccessorDeclaration(parent) ||
    ts.isSetAccessorDeclaration(parent)
  ) {
    return parent.name !== id;
  }

  return true;
}

function looksLikeModuleSpecifier(text: string): boolean {
  if (/^(?:\.{1,2}\/|~~?\/|@@?\/)/.test(text)) return true;
  return /^(?:@[a-z0-9][\w.-]*\/)?[a-z0-9][\w.-]*(?:\/[\w.@-]+)*$/i.test(text);
}

// ---------------------------------------------------------------------------
// Top-level declarations
// ---------------------------------------------------------------------------

function declare(ctx: UnitContext, symbol: SymbolRecord, localName: string | null): void {
  if (localName !== null) {
    if (ctx.moduleScope.has(localName)) {
      ctx.out.warnings.push(`${ctx.unit}:${symbol.span.line}: '${localName}' is declared more than once`);
      return;
    }
    ctx.moduleScope.bind(localName, symbol.id);
  } else {
    const existing = ctx.out.symbols.find((s) => s.id === symbol.id);
    if (existing?.kind === "ExportBinding" && existing.target.type === "component" && symbol.kind === "ExportBinding") {
      // `export default` in a component's <script> is the component itself
      if (symbol.target.type === "local") {
        ctx.out.references.push({
          kind: "identifier",
          name: symbol.target.localName,
          unit: ctx.unit,
          span: symbol.span,
          confidence: "static",
          resolvedId: symbolId(ctx.unit, "local", symbol.target.localName),
        });
      }
      return;
    }
    if (existing) {
      ctx.out.warnings.push(`${ctx.unit}:${symbol.span.line}: '${symbol.name}' is exported more than once`);
      return;
    }
  }
  ctx.out.symbols.push(symbol);
}

function declareExport(ctx: UnitContext, name: string, target: ExportTarget, span: Span): void {
  declare(
    ctx,
    {
      kind: "ExportBinding",
      id: symbolId(ctx.unit, "export", name),
      name,
      unit: ctx.unit,
      span,
      visibility: "exported",
      target,
    },
    null,
  );
}

function declareLocal(
  ctx: UnitContext,
  kind: "Variable" | "Function",
  name: string,
  span: Span,
  exported: boolean,
): void {
  declare(
    ctx,
    {
      kind,
      id: symbolId(ctx.unit, "local", name),
      name,
      unit: ctx.unit,
      span,
      visibility: exported ? "exported" : "local",
      blockScoped: false,
    },
    name,
  );
}

function addModuleRequest(
  ctx: UnitContext,
  specifier: string,
  kind: ModuleRequestKind,
  span: Span,
  optional = false,
): void {
  ctx.out.moduleRequests.push({ specifier, kind, unit: ctx.unit, span, optional });
}

function declareImport(ctx: UnitContext, node: ts.ImportDeclaration, tree: ScriptTree): void {
  const sf = tree.sourceFile;
  if (!ts.isStringLiteral(node.moduleSpecifier)) return;
  const specifier = node.moduleSpecifier.text;
  const clause = node.importClause;
  const span = spanOf(node, sf, tree.lineOffset);

  addModuleRequest(ctx, specifier, clause ? "import" : "side-effect", span);
  if (!clause) return;

  const clauseTypeOnly = clause.isTypeOnly;
  const bind = (
    id: ts.Identifier,
    subKind: "named" | "default" | "namespace",
    importedName: string,
    typeOnly: boolean,
  ): void => {
    const symbol: SymbolRecord = {
      kind: "ImportBinding",
      id: symbolId(ctx.unit, "local", id.text),
      name: id.text,
      unit: ctx.unit,
      span: spanOf(id, sf, tree.lineOffset),
      visibility: "local",
      subKind,
      specifier,
      importedName,
      typeOnly,
    };
    declare(ctx, symbol, id.text);
    if (subKind === "namespace") ctx.namespaceIds.add(symbol.id);
  };

  if (clause.name) bind(clause.name, "default", "default", clauseTypeOnly);
  const bindings = clause.namedBindings;
  if (!bindings) return;
  if (ts.isNamespaceImport(bindings)) {
    bind(bindings.name, "namespace", "*", clauseTypeOnly);
    return;
  }
  for (const element of bindings.elements) {
    const imported = element.propertyName ?? element.name;
    bind(element.name, "named", imported.text, clauseTypeOnly || element.isTypeOnly);
  }
}

function declareExportDeclaration(ctx: UnitContext, node: ts.ExportDeclaration, tree: ScriptTree): void {
  const sf = tree.sourceFile;
  const span = spanOf(node, sf, tree.lineOffset);
  const specifier =
    node.moduleSpecifier && ts.isStringLiteral(node.moduleSpecifier) ? node.moduleSpecifier.text : null;
  const clause = node.exportClause;

  if (specifier !== null) {
    if (!clause) {
      addModuleRequest(ctx, specifier, "star-reexport", span);
      return;
    }
    addModuleRequest(ctx, specifier, "reexport", span);
    if (ts.isNamespaceExport(clause)) {
      declareExport(ctx, clause.name.text, { type: "namespace", specifier }, spanOf(clause.name, sf, tree.lineOffset));
      return;
    }
    for (const element of clause.elements) {
      const imported = (element.propertyName ?? element.name).text;
      declareExport(
        ctx,
        element.name.text,
        { type: "reexport", specifier, importedName: imported },
        spanOf(element, sf, tree.lineOffset),
      );
    }
    return;
  }

  if (clause && ts.isNamedExports(clause)) {
    for (const element of clause.elements) {
      const local = (element.propertyName ?? element.name).text;
      declareExport(ctx, element.name.text, { type: "local", localName: local }, spanOf(element, sf, tree.lineOffset));
    }
  }
}

/**
 * Record module-scope declarations of one script tree.
 */
export function declareTopLevel(ctx: UnitContext, tree: ScriptTree): void {
  const sf = tree.sourceFile;
  const at = (node: ts.Node): Span => spanOf(node, sf, tree.lineOffset);

  for (const statement of sf.statements) {
    if (hasModifier(statement, ts.SyntaxKind.DeclareKeyword)) continue;
    const exported = hasModifier(statement, ts.SyntaxKind.ExportKeyword);
    const isDefault = hasModifier(statement, ts.SyntaxKind.DefaultKeyword);

    if (ts.isImportDeclaration(statement)) {
      declareImport(ctx, statement, tree);
    } else if (ts.isExportDeclaration(statement)) {
      declareExportDeclaration(ctx, statement, tree);
    } else if (ts.isExportAssignment(statement)) {
      const target: ExportTarget = ts.isIdentifier(statement.expression)
        ? { type: "local", localName: statement.expression.text }
        : { type: "expression" };
      declareExport(ctx, "default", target, at(statement));
    } else if (ts.isVariableStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        for (const id of bindingIdentifiers(declaration.name)) {
          declareLocal(ctx, "Variable", id.text, at(id), exported);
          if (exported) declareExport(ctx, id.text, { type: "local", localName: id.text }, at(id));
        }
      }
    } else if (ts.isFunctionDeclaration(statement) || ts.isClassDeclaration(statement)) {
      // Overload signatures have no body
      if (ts.isFunctionDeclaration(statement) && !statement.body) continue;
      const kind = ts.isFunctionDeclaration(statement) ? "Function" : "Variable";
      const name = statement.name;
      if (name) declareLocal(ctx, kind, name.text, at(name), exported);
      if (exported) {
        const exportName = isDefault ? "default" : name?.text;
        if (!exportName) continue;
        const target: ExportTarget = name ? { type: "local", localName: name.text } : { type: "expression" };
        declareExport(ctx, exportName, target, at(name ?? statement));
      }
    } else if (ts.isEnumDeclaration(statement)) {
      declareLocal(ctx, "Variable", statement.name.text, at(statement.name), exported);
      if (exported) {
        declareExport(ctx, statement.name.text, { type: "local", localName: statement.name.text }, at(statement.name));
      }
    } else if (ts.isInterfaceDeclaration(statement) || ts.isTypeAliasDeclaration(statement)) {
      if (exported) {
        declareExport(ctx, isDefault ? "default" : statement.name.text, { type: "declaration" }, at(statement.name));
      }
    }
  }
}

/** The implicit default export every component file has. */
export function declareComponentDefault(ctx: UnitContext): void {
  declareExport(ctx, "default", { type: "component" }, { line: 1, column: 1, endLine: 1 });
}

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

export interface WalkerOptions {
  /** Create symbols for block-scoped locals. */
  trackLocals: boolean;
  /** Every reference gets this span (template expressions). */
  fixedSpan?: Span;
  /** Record string literals that look like module specifiers. */
  configStrings: boolean;
  reportConsole: boolean;
}

/**
 * Walks one tree, resolving identifiers through a lexical scope chain rooted
 * at the unit's module scope.
 */
export class ReferenceWalker {
  constructor(
    private readonly ctx: UnitContext,
    private readonly sourceFile: ts.SourceFile,
    private readonly lineOffset: number,
    private readonly options: WalkerOptions,
  ) {}

  walk(root: ts.Node, scope: Scope = this.ctx.moduleScope): void {
    this.visit(root, scope, new Set());
  }

  private span(node: ts.Node): Span {
    return this.options.fixedSpan ?? spanOf(node, this.sourceFile, this.lineOffset);
  }

  // -- bindings ------------------------------------------------------------

  private declareBinding(id: ts.Identifier, scope: Scope, kind: "Variable" | "Function"): void {
    if (scope.has(id.text)) return;
    if (!this.options.trackLocals) {
      scope.bind(id.text, null);
      return;
    }
    const span = spanOf(id, this.sourceFile, this.lineOffset);
    const symbol: SymbolRecord = {
      kind,
      id: symbolId(this.ctx.unit, "local", `${id.text}@${span.line}:${span.column}`),
      name: id.text,
      unit: this.ctx.unit,
      span,
      visibility: "local",
      blockScoped: true,
    };
    this.ctx.out.symbols.push(symbol);
    scope.bind(id.text, symbol.id);
  }

  /** `var` declarations anywhere in a function body belong to the function scope. */
  private hoistVars(node: ts.Node, scope: Scope): void {
    ts.forEachChild(node, (child) => {
      if (isFunctionLike(child) || ts.isClassLike(child)) return;
      if (ts.isVariableDeclarationList(child) && !isBlockScopedList(child)) {
        for (const declaration of child.declarations) {
          for (const id of bindingIdentifiers(declaration.name)) this.declareBinding(id, scope, "Variable");
        }
      }
      this.hoistVars(child, scope);
    });
  }

  private declareBlock(statements: readonly ts.Statement[], scope: Scope): void {
    for (const statement of statements) {
      if (ts.isVariableStatement(statement) && isBlockScopedList(statement.declarationList)) {
        for (const declaration of statement.declarationList.declarations) {
          for (const id of bindingIdentifiers(declaration.name)) this.declareBinding(id, scope, "Variable");
        }
      } else if (ts.isFunctionDeclaration(statement) && statement.name && statement.body) {
        this.declareBinding(statement.name, scope, "Function");
      } else if (ts.isClassDeclaration(statement) && statement.name) {
        this.declareBinding(statement.name, scope, "Variable");
      }
    }
  }

  // -- records -------------------------------------------------------------

  private recordIdentifier(id: ts.Identifier, scope: Scope, owners: ReadonlySet<string>): void {
    const target = scope.lookup(id.text);
    if (target === undefined || target === null) return;
    if (owners.has(target)) return;

    let member: string | undefined;
    if (this.ctx.namespaceIds.has(target)) {
      const parent = id.parent;
      if (ts.isPropertyAccessExpression(parent) && parent.expression === id) {
        member = parent.name.text;
      } else if (
        ts.isElementAccessExpression(parent) &&
        parent.expression === id &&
        ts.isStringLiteralLike(parent.argumentExpression)
      ) {
        member = parent.argumentExpression.text;
      }
    }

    this.ctx.out.references.push({
      kind: "identifier",
      name: id.text,
      unit: this.ctx.unit,
      span: this.span(id),
      confidence: "static",
      resolvedId: target,
      member,
    });
  }

  recordClassTokens(tokens: readonly ClassToken[], node: ts.Node): void {
    const span = this.span(node);
    for (const token of tokens) {
      if (token.kind === "static") {
        this.ctx.out.references.push({ kind: "css-class", name: token.name, unit: this.ctx.unit, span, confidence: "static" });
      } else {
        this.ctx.out.references.push({
          kind: "css-class",
          name: `${token.prefix}*`,
          unit: this.ctx.unit,
          span,
          confidence: "dynamic",
          prefix: token.prefix,
        });
      }
    }
  }

  private visitCall(node: ts.CallExpression, scope: Scope): void {
    const callee = node.expression;
    const first = node.arguments[0];

    const isImport = callee.kind === ts.SyntaxKind.ImportKeyword;
    const isRequire = ts.isIdentifier(callee) && callee.text === "require" && scope.lookup("require") === undefined;
    if (isImport || isRequire) {
      if (first && ts.isStringLiteralLike(first)) {
        addModuleRequest(this.ctx, first.text, isImport ? "dynamic-import" : "require", this.span(node));
      } else {
        logger.debug(`${this.ctx.unit}: non-literal ${isImport ? "import()" : "require()"} argument`);
      }
      return;
    }

    if (!ts.isPropertyAccessExpression(callee)) return;
    const method = callee.name.text;

    if (this.options.reportConsole && ts.isIdentifier(callee.expression) && callee.expression.text === "console") {
      if (CONSOLE_METHODS.has(method) && scope.lookup("console") === undefined) {
        const span = this.span(node);
        this.ctx.out.findings.push(
          createFinding("clean-console-statement", {
            filePath: this.ctx.unit,
            startLine: span.line,
            endLine: span.endLine,
            column: span.column,
            description: `console.${method}() call`,
            codeSnippet: node.getText(this.sourceFile).split("\n")[0],
          }),
        );
      }
      return;
    }

    if (
      CLASS_LIST_METHODS.has(method) &&
      ts.isPropertyAccessExpression(callee.expression) &&
      callee.expression.name.text === "classList"
    ) {
      // toggle(name, force): only the first argument names a class
      const args = method === "toggle" ? node.arguments.slice(0, 1) : node.arguments;
      for (const arg of args) {
        this.recordClassTokens(evaluateClassBinding(arg), arg);
      }
    }
  }

  private visitJsxAttribute(node: ts.JsxAttribute): void {
    const name = node.name.getText(this.sourceFile);
    if (name !== "className" && name !== "class") return;
    const init = node.initializer;
    if (!init) return;
    if (ts.isStringLiteral(init)) {
      this.recordClassTokens(evaluateClassBinding(init), init);
    } else if (ts.isJsxExpression(init) && init.expression) {
      this.recordClassTokens(evaluateClassBinding(init.expression), init.expression);
    }
  }

  private visitConfigString(node: ts.StringLiteralLike): void {
    const parent = node.parent;
    if (
      ts.isImportDeclaration(parent) ||
      ts.isExportDeclaration(parent) ||
      ts.isExternalModuleReference(parent) ||
      (ts.isPropertyAssignment(parent) && parent.name === node)
    ) {
      return;
    }
    if (looksLikeModuleSpecifier(node.text)) {
      addModuleRequest(this.ctx, node.text, "config", this.span(node), true);
    }
  }

  // -- traversal -----------------------------------------------------------

  private visitChildren(node: ts.Node, scope: Scope, owners: ReadonlySet<string>): void {
    ts.forEachChild(node, (child) => this.visit(child, scope, owners));
  }

  private ownersWith(owners: ReadonlySet<string>, scope: Scope, ids: readonly ts.Identifier[]): ReadonlySet<string> {
    const next = new Set(owners);
    for (const id of ids) {
      const target = scope.lookup(id.text);
      if (target) next.add(target);
    }
    return next;
  }

  private visit(node: ts.Node, scope: Scope, owners: ReadonlySet<string>): void {
    if (ts.isIdentifier(node)) {
      if (isReferencePosition(node)) this.recordIdentifier(node, scope, owners);
      return;
    }

    if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node) || ts.isImportEqualsDeclaration(node)) return;

    if (ts.isStringLiteralLike(node)) {
      if (this.options.configStrings) this.visitConfigString(node);
      return;
    }

    if (ts.isVariableDeclaration(node)) {
      this.visitChildren(node, scope, this.ownersWith(owners, scope, bindingIdentifiers(node.name)));
      return;
    }

    if (ts.isClassDeclaration(node) && node.name) {
      this.visitChildren(node, scope, this.ownersWith(owners, scope, [node.name]));
      return;
    }

    if (isFunctionLike(node)) {
      const own = ts.isFunctionDeclaration(node) && node.name ? this.ownersWith(owners, scope, [node.name]) : owners;
      const inner = new Scope(scope);
      if (ts.isFunctionExpression(node) && node.name) inner.bind(node.name.text, null);
      for (const param of node.parameters) {
        for (const id of bindingIdentifiers(param.name)) inner.bind(id.text, null);
      }
      if (node.body && ts.isBlock(node.body)) this.hoistVars(node.body, inner);
      this.visitChildren(node, inner, own);
      return;
    }

    if (ts.isBlock(node) || ts.isModuleBlock(node)) {
      const inner = new Scope(scope);
      this.declareBlock(node.statements, inner);
      this.visitChildren(node, inner, owners);
      return;
    }

    if (ts.isCaseBlock(node)) {
      const inner = new Scope(scope);
      for (const clause of node.clauses) this.declareBlock(clause.statements, inner);
      this.visitChildren(node, inner, owners);
      return;
    }

    if (ts.isForStatement(node) || ts.isForInStatement(node) || ts.isForOfStatement(node)) {
      const inner = new Scope(scope);
      const init = node.initializer;
      if (init && ts.isVariableDeclarationList(init) && isBlockScopedList(init)) {
        for (const declaration of init.declarations) {
          for (const id of bindingIdentifiers(declaration.name)) this.declareBinding(id, inner, "Variable");
        }
      }
      this.visitChildren(node, inner, owners);
      return;
    }

    if (ts.isCatchClause(node)) {
      const inner = new Scope(scope);
      const variable = node.variableDeclaration;
      if (variable) {
        for (const id of bindingIdentifiers(variable.name)) inner.bind(id.text, null);
      }
      this.visitChildren(node, inner, owners);
      return;
    }

    if (ts.isClassExpression(node) && node.name) {
      const inner = new Scope(scope);
      inner.bind(node.name.text, null);
      this.visitChildren(node, inner, owners);
      return;
    }

    if (ts.isCallExpression(node)) {
      this.visitCall(node, scope);
    } else if (
      ts.isPropertyAccessExpression(node) &&
      ts.isIdentifier(node.expression) &&
      node.expression.text === "$style"
    ) {
      // CSS modules: `$style.name`
      this.recordClassTokens([{ kind: "static", name: node.name.text }], node);
    } else if (ts.isJsxAttribute(node)) {
      this.visitJsxAttribute(node);
    } else if (
      ts.isBinaryExpression(node) &&
      node.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
      ts.isPropertyAccessExpression(node.left) &&
      node.left.name.text === "className"
    ) {
      this.recordClassTokens(evaluateClassBinding(node.right), node.right);
    }

    this.visitChildren(node, scope, owners);
  }
}

/**
 * Walk a script tree of the unit. Must run after `declareTopLevel` has seen
 * every script tree of the unit.
 */
export function collectScriptReferences(ctx: UnitContext, tree: ScriptTree): void {
  const walker = new ReferenceWalker(ctx, tree.sourceFile, tree.lineOffset, {
    trackLocals: ctx.options.reportBlockScoped,
    configStrings: isFrameworkConfig(ctx.unit),
    reportConsole: ctx.options.reportConsole,
  });
  for (const statement of tree.sourceFile.statements) {
    walker.walk(statement);
  }
}
