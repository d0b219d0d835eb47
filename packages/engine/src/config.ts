/**
 * Config loader: reads and validates `.sweepr.yml` configuration files.
 * Uses Zod for schema validation with helpful error messages.
 */

import { readFileSync, existsSync } from "node:fs";
import { availableParallelism } from "node:os";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { getAllRules } from "./rules/registry.js";
import { SeveritySchema, SEVERITY_ORDER, meetsSeverity, type Severity } from "./schemas.js";

export const CONFIG_FILE = ".sweepr.yml";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface SweeprConfig {
  /** Entry-point globs. Empty means "use the framework defaults". */
  entry_points: string[];
  /** Directory the default entry rules and `~`/`@` aliases are relative to. */
  src_dir: string;
  /** Glob patterns of files/dirs to ignore */
  ignore: string[];
  /** Import path aliases, e.g. { "~": "." } */
  aliases: Record<string, string>;
  /** Callee names accepted as sanitizers for raw-markup bindings */
  sanitizers: string[];
  /** Packages never reported as unused. A trailing `*` matches a prefix. */
  package_allowlist: string[];
  /** Include block-scoped locals in unused-variable reporting */
  report_block_scoped: boolean;
  /** Also report devDependencies with no import sites */
  check_dev_dependencies: boolean;
  /** Path prefixes excluded from console-statement findings */
  console_exclude: string[];
  /** Minimum severity to report */
  severity_threshold: Severity;
  /** Rule IDs to disable */
  disable: string[];
  /** Exit non-zero when a finding is at least this severe */
  fail_on: Severity;
  /** Timeout for the vulnerability database query */
  audit_timeout_ms: number;
  /** Units processed at once */
  concurrency: number;
}

export const DEFAULT_SANITIZERS = [
  "DOMPurify.sanitize",
  "sanitize",
  "sanitizeHtml",
  "xss",
  "purify",
  "escapeHtml",
];

export const DEFAULT_PACKAGE_ALLOWLIST = [
  "nuxt",
  "@nuxt/*",
  "@nuxtjs/*",
  "vue",
  "vue-router",
  "typescript",
  "@types/*",
  "sass",
  "sass-embedded",
  "tailwindcss",
  "postcss",
  "autoprefixer",
];

export function defaultConfig(): SweeprConfig {
  return {
    entry_points: [],
    src_dir: ".",
    ignore: [],
    aliases: {},
    sanitizers: [...DEFAULT_SANITIZERS],
    package_allowlist: [...DEFAULT_PACKAGE_ALLOWLIST],
    report_block_scoped: false,
    check_dev_dependencies: false,
    console_exclude: [],
    severity_threshold: "info",
    disable: [],
    fail_on: "high",
    audit_timeout_ms: 10_000,
    concurrency: availableParallelism(),
  };
}

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const sweeprConfigSchema = z.object({
  entry_points: z.array(z.string()).optional(),
  src_dir: z.string().optional(),
  ignore: z.array(z.string()).optional(),
  aliases: z.record(z.string()).optional(),
  sanitizers: z.array(z.string()).optional(),
  package_allowlist: z.array(z.string()).optional(),
  report_block_scoped: z.boolean().optional(),
  check_dev_dependencies: z.boolean().optional(),
  console_exclude: z.array(z.string()).optional(),
  severity_threshold: z.string().optional(),
  disable: z.array(z.string()).optional(),
  fail_on: z.string().optional(),
  audit_timeout_ms: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
}).passthrough();

const KNOWN_KEYS = new Set(Object.keys(sweeprConfigSchema.shape));

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function parseSeverity(key: string, raw: string, fallback: Severity): Severity {
  const result = SeveritySchema.safeParse(raw);
  if (result.success) return result.data;
  const suggestion = didYouMean(raw, SEVERITY_ORDER);
  const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
  logger.warn(`Warning: invalid ${key} '${raw}'${hint}. Using default '${fallback}'.`);
  return fallback;
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.sweepr.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): SweeprConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`Warning: could not read ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`Warning: could not parse ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return defaultConfig();
  }

  if (!parsed || typeof parsed !== "object") return defaultConfig();

  const result = sweeprConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`Warning: config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return defaultConfig();
  }

  const data = result.data;

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      const suggestion = didYouMean(key, [...KNOWN_KEYS]);
      const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
      logger.warn(`Warning: unknown config key '${key}'${hint}`);
    }
  }

  const config = defaultConfig();

  if (data.entry_points) config.entry_points = data.entry_points;
  if (data.src_dir !== undefined) config.src_dir = data.src_dir;
  if (data.ignore) config.ignore = data.ignore;
  if (data.aliases) config.aliases = data.aliases;
  if (data.sanitizers) config.sanitizers = data.sanitizers;
  if (data.package_allowlist) config.package_allowlist = data.package_allowlist;
  if (data.report_block_scoped !== undefined) config.report_block_scoped = data.report_block_scoped;
  if (data.check_dev_dependencies !== undefined) config.check_dev_dependencies = data.check_dev_dependencies;
  if (data.console_exclude) config.console_exclude = data.console_exclude;
  if (data.audit_timeout_ms !== undefined) config.audit_timeout_ms = data.audit_timeout_ms;
  if (data.concurrency !== undefined) config.concurrency = data.concurrency;

  if (data.severity_threshold !== undefined) {
    config.severity_threshold = parseSeverity("severity_threshold", data.severity_threshold, config.severity_threshold);
  }
  if (data.fail_on !== undefined) {
    config.fail_on = parseSeverity("fail_on", data.fail_on, config.fail_on);
  }

  // disable: validate rule IDs
  if (data.disable) {
    const allRuleIds = getAllRules().map((r) => r.id);
    const valid: string[] = [];
    for (const id of data.disable) {
      if (allRuleIds.includes(id)) {
        valid.push(id);
      } else {
        const suggestion = didYouMean(id, allRuleIds);
        const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
        logger.warn(`Warning: unknown rule ID '${id}' in disable list${hint}`);
      }
    }
    config.disable = valid;
  }

  return config;
}

/** `loadConfig`, falling back to defaults when the project has no config file. */
export function resolveConfig(dir: string): SweeprConfig {
  return loadConfig(dir) ?? defaultConfig();
}

/**
 * Filter findings by config: removes disabled rules and below-threshold severities.
 * Processing errors (parse failures, audit outages) are always kept.
 */
export function filterByConfig<T extends { ruleId: string; severity: Severity; category: string }>(
  findings: T[],
  config: SweeprConfig,
): T[] {
  return findings.filter((f) => {
    if (f.category === "ParseError" || f.category === "AuditUnavailable") return true;
    if (config.disable.includes(f.ruleId)) return false;
    return meetsSeverity(f.severity, config.severity_threshold);
  });
}
