/**
 * Run orchestrator.
 *
 * Pipeline:
 *   1. Validate entry rules (fatal ConfigurationError before any parsing)
 *   2. Discover units through the FileSystem capability
 *   3. Parse + extract (clean) or parse + scan (vuln) each unit in a bounded pool
 *   4. Barrier: build the usage graph from every extraction
 *   5. Reachability, dead-code report, unused packages (clean)
 *      or vulnerability query (vuln)
 *   6. Filter by config, dedupe, sort
 */

import { filterByConfig, type SweeprConfig } from "./config.js";
import { queryVulnerabilities, findUnusedPackages } from "./deps/auditor.js";
import { loadManifest } from "./deps/manifest.js";
import type { VulnerabilityDatabase } from "./deps/vulnerability-db.js";
import { nodeFileSystem, type FileSystem } from "./discovery.js";
import { errorMessage, ParseError } from "./errors.js";
import { extractUnit, type UnitExtraction } from "./extract/index.js";
import { selectEntryUnits, validateEntryRules } from "./graph/entry-points.js";
import { ModuleResolver } from "./graph/module-resolver.js";
import { computeReachable } from "./graph/reachability.js";
import { buildUsageGraph } from "./graph/usage-graph.js";
import { matchesAny } from "./glob.js";
import { logger } from "./logger.js";
import { classifyFile, SOURCE_EXTENSIONS } from "./parsers/file-classifier.js";
import { parseUnit } from "./parsers/index.js";
import type { Dialect } from "./parsers/source-unit.js";
import { mapWithConcurrency } from "./pool.js";
import { reportDeadCode, reportUnreachableModules } from "./report/dead-code.js";
import { createFinding, dedupeFindings, sortFindings } from "./report/findings.js";
import { scanUnit } from "./static/pattern-scanner.js";
import { meetsSeverity, type Finding, type RunMode, type Severity } from "./schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalysisParams {
  /** Project root. */
  root: string;
  mode: RunMode;
  config: SweeprConfig;
  /** Defaults to the real file system. */
  fs?: FileSystem;
  /** Vuln mode only. Null or absent skips the query (offline). */
  vulnerabilityDb?: VulnerabilityDatabase | null;
}

export type SkipReason = "parse-error" | "unreadable";

export interface SkippedUnit {
  path: string;
  reason: SkipReason;
  message: string;
}

export interface AnalysisResult {
  mode: RunMode;
  findings: Finding[];
  /** Units discovered. */
  unitCount: number;
  skipped: SkippedUnit[];
  summary: string;
}

interface UnitOutcome {
  path: string;
  dialect: Dialect | null;
  text: string;
  extraction: UnitExtraction | null;
  findings: Finding[];
  skipped: SkippedUnit | null;
}

// ---------------------------------------------------------------------------
// Per-unit work
// ---------------------------------------------------------------------------

function skippedOutcome(path: string, text: string, skipped: SkippedUnit, line: number, column: number): UnitOutcome {
  return {
    path,
    dialect: null,
    text,
    extraction: null,
    findings: [
      createFinding("sys-parse-error", {
        filePath: path,
        startLine: line,
        column,
        description: skipped.message,
      }),
    ],
    skipped,
  };
}

async function processUnit(path: string, params: Required<Pick<AnalysisParams, "root" | "mode" | "config">> & { fs: FileSystem }): Promise<UnitOutcome> {
  const { fs, root, mode, config } = params;

  let text: string;
  try {
    text = await fs.readFile(root, path);
  } catch (err) {
    const message = `Could not read file: ${errorMessage(err)}`;
    return skippedOutcome(path, "", { path, reason: "unreadable", message }, 1, 1);
  }

  try {
    const unit = parseUnit(path, text);
    if (mode === "vuln") {
      return { path, dialect: unit.dialect, text, extraction: null, findings: scanUnit(unit, { sanitizers: config.sanitizers }), skipped: null };
    }
    const extraction = extractUnit(unit, {
      reportBlockScoped: config.report_block_scoped,
      reportConsole: !matchesAny(path, config.console_exclude, true),
    });
    for (const warning of extraction.warnings) logger.warn(warning);
    return { path, dialect: unit.dialect, text, extraction, findings: extraction.findings, skipped: null };
  } catch (err) {
    if (err instanceof ParseError) {
      logger.debug(`Skipping ${err.message}`);
      return skippedOutcome(path, text, { path, reason: "parse-error", message: err.reason }, err.position.line, err.position.column);
    }
    // Anything else is still unit-local: record it and move on
    logger.warn(`Failed to analyse ${path}: ${errorMessage(err)}`);
    return skippedOutcome(path, text, { path, reason: "parse-error", message: errorMessage(err) }, 1, 1);
  }
}

// ---------------------------------------------------------------------------
// Summary and exit status
// ---------------------------------------------------------------------------

export function buildSummary(mode: RunMode, unitCount: number, skipped: readonly SkippedUnit[], findings: readonly Finding[]): string {
  const parts = [`${mode}: ${unitCount} units analysed`];
  if (skipped.length === 0) {
    parts.push("0 skipped");
  } else {
    const byReason = new Map<SkipReason, number>();
    for (const s of skipped) byReason.set(s.reason, (byReason.get(s.reason) ?? 0) + 1);
    const reasons = [...byReason.entries()].map(([reason, n]) => `${n} ${reason}`).join(", ");
    parts.push(`${skipped.length} skipped (${reasons})`);
  }
  parts.push(`${findings.length} findings`);
  return parts.join(", ");
}

/** 1 when any finding is at least as severe as `failOn`, else 0. */
export function exitStatus(findings: readonly Finding[], failOn: Severity): 0 | 1 {
  return findings.some((f) => meetsSeverity(f.severity, failOn)) ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export async function runAnalysis(params: AnalysisParams): Promise<AnalysisResult> {
  const { root, mode, config } = params;
  const fs = params.fs ?? nodeFileSystem;

  // 1. Entry rules are checked before anything is parsed
  await validateEntryRules(config.entry_points, fs, root);

  // 2. Discover
  const paths = (await fs.listFiles(root, { ignore: config.ignore, extensions: SOURCE_EXTENSIONS }))
    .filter((p) => classifyFile(p) !== null);
  logger.info(`[${mode}] Found ${paths.length} source units`);

  // 3. Per-unit work
  const outcomes = await mapWithConcurrency(paths, config.concurrency, (path) =>
    processUnit(path, { fs, root, mode, config }),
  );

  const skipped = outcomes.flatMap((o) => (o.skipped ? [o.skipped] : []));
  const findings: Finding[] = outcomes.flatMap((o) => o.findings);

  if (mode === "clean") {
    // 4. Barrier: every unit is done before the graph exists
    const parsed = outcomes.filter((o): o is UnitOutcome & { dialect: Dialect } => o.dialect !== null);
    const extractions = outcomes.flatMap((o) => (o.extraction ? [o.extraction] : []));
    const packages = await loadManifest(fs, root);
    const entryUnits = selectEntryUnits(parsed.map((o) => o.path), config.entry_points, config.src_dir);

    const { graph, findings: unresolved, importSites } = buildUsageGraph({
      extractions,
      resolver: new ModuleResolver(new Set(paths), { aliases: config.aliases, srcDir: config.src_dir }),
      entryUnits,
      packages,
    });
    logger.debug(`[clean] Usage graph: ${graph.size} nodes, ${entryUnits.length} entry units`);

    // 5. Report
    const reachable = computeReachable(graph);
    findings.push(
      ...unresolved,
      ...reportDeadCode({ graph, texts: new Map(outcomes.map((o) => [o.path, o.text])) }),
      ...reportUnreachableModules({ units: parsed, reachable, hasEntries: entryUnits.length > 0 }),
      ...findUnusedPackages({
        packages,
        importSites,
        allowlist: config.package_allowlist,
        checkDevDependencies: config.check_dev_dependencies,
      }),
    );
  } else if (params.vulnerabilityDb) {
    const packages = await loadManifest(fs, root);
    findings.push(...(await queryVulnerabilities(packages, params.vulnerabilityDb, { timeoutMs: config.audit_timeout_ms })));
  } else {
    logger.info("[vuln] Vulnerability database query skipped (offline)");
  }

  // 6. Merge
  const final = sortFindings(dedupeFindings(filterByConfig(findings, config)));
  const summary = buildSummary(mode, paths.length, skipped, final);
  logger.info(`[${mode}] ${summary}`);

  return { mode, findings: final, unitCount: paths.length, skipped, summary };
}
