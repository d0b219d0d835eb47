/**
 * Project-wide usage graph.
 *
 * Nodes are interned string ids: symbol ids, one `unit:<path>` node per unit
 * and one `entry:<path>` node per entry-point unit. Edges carry the
 * confidence of the reference that produced them. The graph is built once,
 * after every unit has been extracted, and only read afterwards.
 */

import type {
  Confidence,
  ExportBindingSymbol,
  ImportBindingSymbol,
  ModuleRequest,
  ModuleRequestKind,
  PackageDependencySymbol,
  SymbolRecord,
  UnitExtraction,
} from "../extract/types.js";
import { symbolId } from "../extract/types.js";
import { createFinding } from "../report/findings.js";
import type { Finding } from "../schemas.js";
import type { ModuleResolver, Resolution } from "./module-resolver.js";

export interface Edge {
  to: number;
  confidence: Confidence;
}

export function unitNode(path: string): string {
  return `unit:${path}`;
}

export function entryNode(path: string): string {
  return `entry:${path}`;
}

export class UsageGraph {
  private readonly ids: string[] = [];
  private readonly index = new Map<string, number>();
  private readonly edges: Edge[][] = [];
  private readonly staticIn: number[] = [];
  private readonly dynamicIn: number[] = [];
  private readonly edgeKeys = new Set<string>();
  private readonly entryNodes: number[] = [];

  readonly symbols = new Map<string, SymbolRecord>();

  intern(id: string): number {
    const existing = this.index.get(id);
    if (existing !== undefined) return existing;
    const n = this.ids.length;
    this.ids.push(id);
    this.index.set(id, n);
    this.edges.push([]);
    this.staticIn.push(0);
    this.dynamicIn.push(0);
    return n;
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  addSymbol(symbol: SymbolRecord): void {
    this.symbols.set(symbol.id, symbol);
    this.intern(symbol.id);
  }

  /** Duplicate edges are dropped; a static edge and a dynamic one may coexist. */
  addEdge(from: string, to: string, confidence: Confidence): void {
    if (from === to) return;
    const a = this.intern(from);
    const b = this.intern(to);
    const key = `${a}>${b}:${confidence}`;
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);
    this.edges[a]?.push({ to: b, confidence });
    if (confidence === "static") this.staticIn[b] = (this.staticIn[b] ?? 0) + 1;
    else this.dynamicIn[b] = (this.dynamicIn[b] ?? 0) + 1;
  }

  addEntry(id: string): void {
    const n = this.intern(id);
    if (!this.entryNodes.includes(n)) this.entryNodes.push(n);
  }

  get entries(): readonly number[] {
    return this.entryNodes;
  }

  get size(): number {
    return this.ids.length;
  }

  idOf(n: number): string {
    return this.ids[n] ?? "";
  }

  successors(n: number): readonly Edge[] {
    return this.edges[n] ?? [];
  }

  incoming(id: string): { static: number; dynamic: number } {
    const n = this.index.get(id);
    if (n === undefined) return { static: 0, dynamic: 0 };
    return { static: this.staticIn[n] ?? 0, dynamic: this.dynamicIn[n] ?? 0 };
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export interface BuildInput {
  extractions: readonly UnitExtraction[];
  resolver: ModuleResolver;
  entryUnits: readonly string[];
  packages: readonly PackageDependencySymbol[];
}

export interface BuildResult {
  graph: UsageGraph;
  /** UnresolvedImport findings. */
  findings: Finding[];
  /** Package name → number of import sites across all units. */
  importSites: Map<string, number>;
}

class GraphBuilder {
  readonly graph = new UsageGraph();
  readonly findings: Finding[] = [];
  readonly importSites = new Map<string, number>();

  private readonly exportsByUnit = new Map<string, Map<string, ExportBindingSymbol>>();
  private readonly starTargets = new Map<string, string[]>();
  private readonly globalClasses = new Map<string, string[]>();
  private readonly scopedClasses = new Map<string, Map<string, string[]>>();
  /** Every class a unit declares, scoped or not. */
  private readonly ownClasses = new Map<string, Map<string, string[]>>();
  private readonly resolutions = new Map<string, Resolution>();
  private readonly packageIds = new Map<string, string>();
  private readonly pendingLoads: Array<{ from: string; target: string }> = [];

  constructor(private readonly input: BuildInput) {}

  build(): BuildResult {
    const { extractions } = this.input;

    for (const pkg of this.input.packages) {
      this.graph.addSymbol(pkg);
      this.packageIds.set(pkg.name, pkg.id);
    }
    for (const extraction of extractions) {
      this.graph.intern(unitNode(extraction.unit));
      for (const symbol of extraction.symbols) this.index(symbol);
    }
    for (const extraction of extractions) {
      for (const request of extraction.moduleRequests) this.linkRequest(request);
    }
    this.linkLoads();
    for (const extraction of extractions) {
      for (const symbol of extraction.symbols) this.linkSymbol(symbol);
      this.linkReferences(extraction);
    }
    for (const unit of this.input.entryUnits) this.linkEntry(unit);

    return { graph: this.graph, findings: this.findings, importSites: this.importSites };
  }

  // -- indexing ------------------------------------------------------------

  private index(symbol: SymbolRecord): void {
    this.graph.addSymbol(symbol);
    if (symbol.kind === "ExportBinding") {
      let exports = this.exportsByUnit.get(symbol.unit);
      if (!exports) {
        exports = new Map();
        this.exportsByUnit.set(symbol.unit, exports);
      }
      exports.set(symbol.name, symbol);
    } else if (symbol.kind === "CssClass") {
      const own = this.ownClasses.get(symbol.unit) ?? new Map<string, string[]>();
      this.ownClasses.set(symbol.unit, own);
      own.set(symbol.name, [...(own.get(symbol.name) ?? []), symbol.id]);

      let table = this.globalClasses;
      if (symbol.scoped) {
        const perUnit = this.scopedClasses.get(symbol.unit) ?? new Map<string, string[]>();
        this.scopedClasses.set(symbol.unit, perUnit);
        table = perUnit;
      }
      const ids = table.get(symbol.name) ?? [];
      ids.push(symbol.id);
      table.set(symbol.name, ids);
    }
  }

  private resolve(unit: string, specifier: string, kind: ModuleRequestKind = "import"): Resolution {
    const key = `${unit}\0${specifier}\0${kind}`;
    const cached = this.resolutions.get(key);
    if (cached) return cached;
    const resolution = this.input.resolver.resolve(unit, specifier, kind);
    this.resolutions.set(key, resolution);
    return resolution;
  }

  // -- exports -------------------------------------------------------------

  private hasEsmExports(unit: string): boolean {
    return (this.exportsByUnit.get(unit)?.size ?? 0) > 0 || (this.starTargets.get(unit)?.length ?? 0) > 0;
  }

  /** Follows `export *` chains; `default` never travels through them. */
  private findExport(unit: string, name: string, visited = new Set<string>()): ExportBindingSymbol | null {
    if (visited.has(unit)) return null;
    visited.add(unit);
    const own = this.exportsByUnit.get(unit)?.get(name);
    if (own) return own;
    if (name === "default") return null;
    for (const target of this.starTargets.get(unit) ?? []) {
      const found = this.findExport(target, name, visited);
      if (found) return found;
    }
    return null;
  }

  private allExports(unit: string, visited = new Set<string>()): ExportBindingSymbol[] {
    if (visited.has(unit)) return [];
    visited.add(unit);
    const out = [...(this.exportsByUnit.get(unit)?.values() ?? [])];
    for (const target of this.starTargets.get(unit) ?? []) {
      out.push(...this.allExports(target, visited).filter((e) => e.name !== "default"));
    }
    return out;
  }

  private unresolvedImport(unit: string, line: number, column: number, description: string, symbol?: string): void {
    this.findings.push(
      createFinding("sys-unresolved-import", { filePath: unit, startLine: line, column, description, symbol }),
    );
  }

  // -- module requests -----------------------------------------------------

  private linkRequest(request: ModuleRequest): void {
    const resolution = this.resolve(request.unit, request.specifier, request.kind);
    const from = unitNode(request.unit);

    switch (resolution.kind) {
      case "package": {
        this.importSites.set(resolution.name, (this.importSites.get(resolution.name) ?? 0) + 1);
        const pkg = this.packageIds.get(resolution.name);
        if (pkg) this.graph.addEdge(from, pkg, "static");
        return;
      }
      case "unresolved":
        if (!request.optional) {
          this.unresolvedImport(
            request.unit,
            request.span.line,
            request.span.column,
            `Cannot resolve module '${request.specifier}'`,
          );
        }
        return;
      case "unit":
        break;
      default:
        return;
    }

    const target = resolution.path;
    switch (request.kind) {
      case "star-reexport": {
        const targets = this.starTargets.get(request.unit) ?? [];
        targets.push(target);
        this.starTargets.set(request.unit, targets);
        this.graph.addEdge(from, unitNode(target), "static");
        return;
      }
      case "side-effect":
      case "css-import":
      case "config":
      case "reexport":
        this.graph.addEdge(from, unitNode(target), "static");
        return;
      case "require":
      case "dynamic-import":
        // Export edges wait until every star target is known
        this.graph.addEdge(from, unitNode(target), "static");
        this.pendingLoads.push({ from, target });
        return;
      case "import":
        return;
    }
  }

  /** `import("./x")` / `require("./x")`: the default export is used, any other may be. */
  private linkLoads(): void {
    for (const { from, target } of this.pendingLoads) {
      for (const exp of this.allExports(target)) {
        this.graph.addEdge(from, exp.id, exp.name === "default" ? "static" : "dynamic");
      }
    }
  }

  // -- symbols -------------------------------------------------------------

  private linkSymbol(symbol: SymbolRecord): void {
    if (symbol.kind === "ImportBinding") this.linkImport(symbol);
    else if (symbol.kind === "ExportBinding") this.linkExport(symbol);
  }

  private linkImport(symbol: ImportBindingSymbol): void {
    const resolution = this.resolve(symbol.unit, symbol.specifier);
    if (resolution.kind !== "unit") return;
    const target = resolution.path;
    this.graph.addEdge(symbol.id, unitNode(target), "static");

    if (symbol.subKind === "namespace") return;

    const exp = this.findExport(target, symbol.importedName);
    if (exp) {
      this.graph.addEdge(symbol.id, exp.id, "static");
    } else if (this.hasEsmExports(target)) {
      this.unresolvedImport(
        symbol.unit,
        symbol.span.line,
        symbol.span.column,
        `'${symbol.importedName}' is not exported by '${target}'`,
        symbol.name,
      );
    }
  }

  private linkExport(symbol: ExportBindingSymbol): void {
    this.graph.addEdge(symbol.id, unitNode(symbol.unit), "static");
    const target = symbol.target;

    switch (target.type) {
      case "local": {
        const local = symbolId(symbol.unit, "local", target.localName);
        if (this.graph.symbols.has(local)) this.graph.addEdge(symbol.id, local, "static");
        return;
      }
      case "reexport": {
        const resolution = this.resolve(symbol.unit, target.specifier);
        if (resolution.kind !== "unit") return;
        const exp = this.findExport(resolution.path, target.importedName);
        if (exp) {
          this.graph.addEdge(symbol.id, exp.id, "static");
        } else if (this.hasEsmExports(resolution.path)) {
          this.unresolvedImport(
            symbol.unit,
            symbol.span.line,
            symbol.span.column,
            `'${target.importedName}' is not exported by '${resolution.path}'`,
            symbol.name,
          );
        }
        return;
      }
      case "namespace": {
        const resolution = this.resolve(symbol.unit, target.specifier);
        if (resolution.kind !== "unit") return;
        for (const exp of this.allExports(resolution.path)) this.graph.addEdge(symbol.id, exp.id, "dynamic");
        return;
      }
      default:
        return;
    }
  }

  // -- references ----------------------------------------------------------

  private namespaceTarget(id: string): string | null {
    const symbol = this.graph.symbols.get(id);
    if (symbol?.kind !== "ImportBinding" || symbol.subKind !== "namespace") return null;
    const resolution = this.resolve(symbol.unit, symbol.specifier);
    return resolution.kind === "unit" ? resolution.path : null;
  }

  private linkReferences(extraction: UnitExtraction): void {
    const from = unitNode(extraction.unit);
    const scoped = this.scopedClasses.get(extraction.unit);

    for (const ref of extraction.references) {
      if (ref.kind === "identifier") {
        if (!ref.resolvedId || !this.graph.symbols.has(ref.resolvedId)) continue;
        this.graph.addEdge(from, ref.resolvedId, ref.confidence);

        const nsTarget = this.namespaceTarget(ref.resolvedId);
        if (nsTarget === null) continue;
        const member = ref.member !== undefined ? this.findExport(nsTarget, ref.member) : null;
        if (member) {
          this.graph.addEdge(ref.resolvedId, member.id, "static");
        } else {
          // Whole-namespace use: any export may be read
          for (const exp of this.allExports(nsTarget)) this.graph.addEdge(ref.resolvedId, exp.id, "dynamic");
        }
        continue;
      }

      if (ref.confidence === "static") {
        for (const id of [...(scoped?.get(ref.name) ?? []), ...(this.globalClasses.get(ref.name) ?? [])]) {
          this.graph.addEdge(from, id, "static");
        }
        continue;
      }

      // Dynamic class expressions only vouch for classes the same unit declares
      const prefix = ref.prefix ?? "";
      for (const [name, ids] of this.ownClasses.get(extraction.unit) ?? new Map<string, string[]>()) {
        if (!name.startsWith(prefix)) continue;
        for (const id of ids) this.graph.addEdge(from, id, "dynamic");
      }
    }
  }

  // -- entries -------------------------------------------------------------

  private linkEntry(unit: string): void {
    const node = entryNode(unit);
    this.graph.addEntry(node);
    this.graph.addEdge(node, unitNode(unit), "static");
    for (const exp of this.allExports(unit)) this.graph.addEdge(node, exp.id, "static");
  }
}

/**
 * Aggregate every unit's records into one graph. Runs after all units are
 * extracted.
 */
export function buildUsageGraph(input: BuildInput): BuildResult {
  return new GraphBuilder(input).build();
}
