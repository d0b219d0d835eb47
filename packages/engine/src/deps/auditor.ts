/**
 * Dependency auditor: unused declared packages, and known vulnerabilities from
 * the injected database.
 */

import { errorMessage } from "../errors.js";
import type { PackageDependencySymbol } from "../extract/types.js";
import { logger } from "../logger.js";
import { createFinding } from "../report/findings.js";
import type { Finding, Severity } from "../schemas.js";
import { concreteVersion, MANIFEST_FILE } from "./manifest.js";
import type { AdvisorySeverity, VulnerabilityDatabase } from "./vulnerability-db.js";

export interface UnusedPackageInput {
  packages: readonly PackageDependencySymbol[];
  /** Package name → import sites, from the usage graph builder. */
  importSites: ReadonlyMap<string, number>;
  /** Names never reported. A trailing `*` matches a prefix. */
  allowlist: readonly string[];
  checkDevDependencies: boolean;
}

export function isAllowlisted(name: string, allowlist: readonly string[]): boolean {
  return allowlist.some((entry) => (entry.endsWith("*") ? name.startsWith(entry.slice(0, -1)) : entry === name));
}

export function findUnusedPackages(input: UnusedPackageInput): Finding[] {
  const findings: Finding[] = [];
  for (const pkg of input.packages) {
    if (pkg.section === "dev" && !input.checkDevDependencies) continue;
    if ((input.importSites.get(pkg.name) ?? 0) > 0) continue;
    if (isAllowlisted(pkg.name, input.allowlist)) continue;

    const section = pkg.section === "runtime" ? "dependencies" : "devDependencies";
    findings.push(
      createFinding("clean-unused-package", {
        filePath: MANIFEST_FILE,
        startLine: pkg.span.line,
        column: pkg.span.column,
        symbol: pkg.name,
        description: `'${pkg.name}' is declared in ${section} but never imported`,
        codeSnippet: `"${pkg.name}": "${pkg.version}"`,
      }),
    );
  }
  return findings;
}

const ADVISORY_SEVERITY: Record<AdvisorySeverity, Severity> = {
  critical: "critical",
  high: "high",
  moderate: "medium",
  low: "low",
  info: "info",
};

/** Settles with the promise, or rejects as soon as the signal aborts. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error("aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export interface VulnerabilityQueryOptions {
  timeoutMs: number;
}

/**
 * Ask the database about every declared dependency under one timeout.
 * Failures never throw: they collapse into a single AuditUnavailable finding
 * next to whatever answers did arrive.
 */
export async function queryVulnerabilities(
  packages: readonly PackageDependencySymbol[],
  db: VulnerabilityDatabase,
  options: VulnerabilityQueryOptions,
): Promise<Finding[]> {
  const queryable = packages.flatMap((pkg) => {
    const version = concreteVersion(pkg.version);
    if (version === null) {
      logger.debug(`Skipping audit of ${pkg.name}: no concrete version in '${pkg.version}'`);
      return [];
    }
    return [{ pkg, version }];
  });
  if (queryable.length === 0) return [];

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  let settled: PromiseSettledResult<Finding[]>[];
  try {
    settled = await Promise.allSettled(
      queryable.map(async ({ pkg, version }) => {
        const advisories = await abortable(db.query(pkg.name, version, controller.signal), controller.signal);
        return advisories.map((advisory) =>
          createFinding("vuln-known-vulnerability", {
            filePath: MANIFEST_FILE,
            startLine: pkg.span.line,
            column: pkg.span.column,
            symbol: pkg.name,
            severity: ADVISORY_SEVERITY[advisory.severity],
            description: `${pkg.name}@${version}: ${advisory.title}`,
            rationale: advisory.url ?? `Advisory ${advisory.id}`,
            codeSnippet: `"${pkg.name}": "${pkg.version}"`,
          }),
        );
      }),
    );
  } finally {
    clearTimeout(timer);
  }

  const findings: Finding[] = [];
  const failures: unknown[] = [];
  for (const result of settled) {
    if (result.status === "fulfilled") findings.push(...result.value);
    else failures.push(result.reason);
  }

  if (failures.length > 0) {
    const reason = controller.signal.aborted
      ? `timed out after ${options.timeoutMs}ms`
      : errorMessage(failures[0]);
    logger.warn(`Vulnerability audit degraded: ${reason}`);
    findings.push(
      createFinding("vuln-audit-unavailable", {
        filePath: MANIFEST_FILE,
        startLine: 1,
        description: `Vulnerability database '${db.name}' unavailable for ${failures.length} of ${queryable.length} packages: ${reason}`,
      }),
    );
  }
  return findings;
}
