/**
 * Evaluates class-binding expressions (`:class`, `className`, `classList.add`)
 * into class tokens. Literal text is resolved to static class names; anything
 * computed at runtime becomes a dynamic token carrying its literal prefix.
 */

import ts from "typescript";

export type ClassToken =
  | { kind: "static"; name: string }
  | { kind: "dynamic"; prefix: string };

const HOLE = "\u0000";

/** Split literal text (with holes for computed parts) into tokens. */
function tokensOf(text: string): ClassToken[] {
  const out: ClassToken[] = [];
  for (const part of text.split(/\s+/)) {
    if (!part) continue;
    const hole = part.indexOf(HOLE);
    if (hole === -1) out.push({ kind: "static", name: part });
    else out.push({ kind: "dynamic", prefix: part.slice(0, hole) });
  }
  return out;
}

/** Whitespace-separated class names in a static attribute value. */
export function splitClassList(value: string): string[] {
  return value.split(/\s+/).filter((part) => part.length > 0);
}

function templateText(node: ts.TemplateExpression): string {
  let text = node.head.text;
  for (const span of node.templateSpans) {
    text += HOLE + span.literal.text;
  }
  return text;
}

/** `"btn-" + size` flattened into literal text with holes. */
function concatenationText(node: ts.Expression): string {
  if (ts.isBinaryExpression(node) && node.operatorToken.kind === ts.SyntaxKind.PlusToken) {
    return concatenationText(node.left) + concatenationText(node.right);
  }
  if (ts.isParenthesizedExpression(node)) return concatenationText(node.expression);
  if (ts.isStringLiteralLike(node)) return node.text;
  if (ts.isTemplateExpression(node)) return templateText(node);
  return HOLE;
}

function propertyKeyTokens(name: ts.PropertyName): ClassToken[] {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNoSubstitutionTemplateLiteral(name)) {
    return tokensOf(name.text);
  }
  if (ts.isComputedPropertyName(name)) return evaluateClassBinding(name.expression);
  return [];
}

export function evaluateClassBinding(node: ts.Expression): ClassToken[] {
  if (ts.isParenthesizedExpression(node) || ts.isAsExpression(node) || ts.isNonNullExpression(node)) {
    return evaluateClassBinding(node.expression);
  }
  if (ts.isStringLiteralLike(node)) return tokensOf(node.text);
  if (ts.isTemplateExpression(node)) return tokensOf(templateText(node));

  if (ts.isConditionalExpression(node)) {
    return [...evaluateClassBinding(node.whenTrue), ...evaluateClassBinding(node.whenFalse)];
  }

  if (ts.isBinaryExpression(node)) {
    switch (node.operatorToken.kind) {
      case ts.SyntaxKind.AmpersandAmpersandToken:
        return evaluateClassBinding(node.right);
      case ts.SyntaxKind.BarBarToken:
      case ts.SyntaxKind.QuestionQuestionToken:
        return [...evaluateClassBinding(node.left), ...evaluateClassBinding(node.right)];
      case ts.SyntaxKind.PlusToken:
        return tokensOf(concatenationText(node));
      default:
        return [{ kind: "dynamic", prefix: "" }];
    }
  }

  if (ts.isArrayLiteralExpression(node)) {
    return node.elements.flatMap((element) =>
      ts.isSpreadElement(element) ? evaluateClassBinding(element.expression) : evaluateClassBinding(element),
    );
  }

  if (ts.isObjectLiteralExpression(node)) {
    const out: ClassToken[] = [];
    for (const prop of node.properties) {
      if (ts.isPropertyAssignment(prop) || ts.isMethodDeclaration(prop)) {
        out.push(...propertyKeyTokens(prop.name));
      } else if (ts.isShorthandPropertyAssignment(prop)) {
        out.push(...tokensOf(prop.name.text));
      } else if (ts.isSpreadAssignment(prop)) {
        out.push({ kind: "dynamic", prefix: "" });
      }
    }
    return out;
  }

  switch (node.kind) {
    case ts.SyntaxKind.NullKeyword:
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
    case ts.SyntaxKind.NumericLiteral:
      return [];
  }
  if (ts.isIdentifier(node) && node.text === "undefined") return [];

  // CSS modules: `$style.name`
  if (ts.isPropertyAccessExpression(node) && ts.isIdentifier(node.expression) && node.expression.text === "$style") {
    return [{ kind: "static", name: node.name.text }];
  }

  // Identifiers, member accesses, calls
  return [{ kind: "dynamic", prefix: "" }];
}
