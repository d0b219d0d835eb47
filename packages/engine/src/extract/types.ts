/**
 * Declaration and reference records emitted by the extractors.
 *
 * Symbols carry string ids of the form `<unit>#<space>:<name>` so the graph
 * can intern them without holding object links across units.
 */

import type { Finding } from "../schemas.js";
import type { Span } from "../parsers/source-unit.js";

export type Confidence = "static" | "dynamic";
export type Visibility = "exported" | "local";

interface SymbolBase {
  id: string;
  name: string;
  unit: string;
  span: Span;
  visibility: Visibility;
}

export type ImportSubKind = "named" | "default" | "namespace";

export interface ImportBindingSymbol extends SymbolBase {
  kind: "ImportBinding";
  subKind: ImportSubKind;
  specifier: string;
  /** `default` for default imports, `*` for namespace imports. */
  importedName: string;
  typeOnly: boolean;
}

export type ExportTarget =
  /** `export const a`, `export { a }`, `export default a` */
  | { type: "local"; localName: string }
  /** `export { a as b } from "./x"` */
  | { type: "reexport"; specifier: string; importedName: string }
  /** `export * as ns from "./x"` */
  | { type: "namespace"; specifier: string }
  /** `export default <expression>` */
  | { type: "expression" }
  /** The implicit default export of a component file. */
  | { type: "component" }
  /** Exported interfaces and type aliases. No runtime local. */
  | { type: "declaration" };

export interface ExportBindingSymbol extends SymbolBase {
  kind: "ExportBinding";
  target: ExportTarget;
}

export interface VariableSymbol extends SymbolBase {
  kind: "Variable";
  blockScoped: boolean;
}

export interface FunctionSymbol extends SymbolBase {
  kind: "Function";
  blockScoped: boolean;
}

export interface CssClassSymbol extends SymbolBase {
  kind: "CssClass";
  /** Only usages inside the declaring unit resolve to it. */
  scoped: boolean;
}

export type DependencySection = "runtime" | "dev";

export interface PackageDependencySymbol extends SymbolBase {
  kind: "PackageDependency";
  version: string;
  section: DependencySection;
}

export type SymbolRecord =
  | ImportBindingSymbol
  | ExportBindingSymbol
  | VariableSymbol
  | FunctionSymbol
  | CssClassSymbol
  | PackageDependencySymbol;

export type SymbolKind = SymbolRecord["kind"];

interface ReferenceBase {
  unit: string;
  span: Span;
  confidence: Confidence;
}

/**
 * A name used in script or template code. `resolvedId` is set when the
 * extractor resolved it against the unit's own scopes; unresolved names are
 * globals (or framework auto-imports) and produce no edge.
 */
export interface IdentifierReference extends ReferenceBase {
  kind: "identifier";
  name: string;
  resolvedId?: string;
  /** `ns.member` on a namespace import. */
  member?: string;
}

/**
 * A class used by markup or script. Static references name the class;
 * dynamic ones only know a literal prefix (possibly empty).
 */
export interface CssClassReference extends ReferenceBase {
  kind: "css-class";
  name: string;
  /** Dynamic references: literal text every matching class starts with. */
  prefix?: string;
}

export type ReferenceSite = IdentifierReference | CssClassReference;

export type ModuleRequestKind =
  | "import"
  | "side-effect"
  | "reexport"
  | "star-reexport"
  | "require"
  | "dynamic-import"
  | "css-import"
  | "config";

export interface ModuleRequest {
  specifier: string;
  kind: ModuleRequestKind;
  unit: string;
  span: Span;
  /** Not reported as unresolved when it fails to resolve. */
  optional: boolean;
}

export interface UnitExtraction {
  unit: string;
  symbols: SymbolRecord[];
  references: ReferenceSite[];
  moduleRequests: ModuleRequest[];
  /** Findings produced directly by extraction (console statements). */
  findings: Finding[];
  /** Redeclarations and other non-fatal oddities. */
  warnings: string[];
}

export function symbolId(unit: string, space: string, name: string): string {
  return `${unit}#${space}:${name}`;
}

export function emptyExtraction(unit: string): UnitExtraction {
  return { unit, symbols: [], references: [], moduleRequests: [], findings: [], warnings: [] };
}
