// ---------------------------------------------------------------------------
// @sweepr/engine
//
// Usage resolution and pattern scanning for Vue and Nuxt source trees.
// Shared by the CLI and by anything else that wants findings as data.
// ---------------------------------------------------------------------------

// Orchestrator
export {
  runAnalysis,
  exitStatus,
  buildSummary,
  type AnalysisParams,
  type AnalysisResult,
  type SkippedUnit,
  type SkipReason,
} from "./analyzer.js";

// Schemas
export {
  FindingSchema,
  SeveritySchema,
  CategorySchema,
  RunModeSchema,
  SEVERITY_ORDER,
  meetsSeverity,
  severityRank,
  type Finding,
  type Severity,
  type Category,
  type RunMode,
} from "./schemas.js";

// Errors
export { ParseError, ConfigurationError, errorMessage, type SourcePosition } from "./errors.js";

// Config
export {
  CONFIG_FILE,
  DEFAULT_SANITIZERS,
  DEFAULT_PACKAGE_ALLOWLIST,
  defaultConfig,
  loadConfig,
  resolveConfig,
  filterByConfig,
  type SweeprConfig,
} from "./config.js";

// File access
export {
  nodeFileSystem,
  createMemoryFileSystem,
  type FileSystem,
  type ListOptions,
} from "./discovery.js";

// Parsers
export { classifyFile, SOURCE_EXTENSIONS, type FileClassification } from "./parsers/file-classifier.js";
export { parseUnit } from "./parsers/index.js";
export type { SourceUnit, Dialect, Span } from "./parsers/source-unit.js";

// Extraction
export {
  extractUnit,
  symbolId,
  type ExtractOptions,
  type UnitExtraction,
  type SymbolRecord,
  type ReferenceSite,
  type ModuleRequest,
} from "./extract/index.js";

// Graph
export { ModuleResolver, type Resolution, type ResolverOptions } from "./graph/module-resolver.js";
export { UsageGraph, buildUsageGraph, type BuildInput, type BuildResult } from "./graph/usage-graph.js";
export { computeReachable } from "./graph/reachability.js";
export { selectEntryUnits, validateEntryRules, conventionPatterns } from "./graph/entry-points.js";

// Pattern scanner
export { scanUnit, type ScanOptions } from "./static/pattern-scanner.js";

// Dependencies
export { parseManifest, loadManifest, concreteVersion, MANIFEST_FILE } from "./deps/manifest.js";
export { findUnusedPackages, queryVulnerabilities, isAllowlisted } from "./deps/auditor.js";
export {
  NpmAdvisoryDatabase,
  MemoryVulnerabilityDatabase,
  type VulnerabilityDatabase,
  type KnownVulnerability,
} from "./deps/vulnerability-db.js";

// Report
export { livenessOf, reportDeadCode, reportUnreachableModules, type Liveness } from "./report/dead-code.js";
export { createFinding, dedupeFindings, sortFindings } from "./report/findings.js";

// Rules
export { getAllRules, getRulesForMode, getRule, type Rule } from "./rules/registry.js";

// Logger
export { logger } from "./logger.js";
