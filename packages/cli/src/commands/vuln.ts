import { NpmAdvisoryDatabase, type VulnerabilityDatabase } from "@sweepr/engine";
import { runReportCommand, type ExitCode, type ReportCommandOptions } from "./report.js";

export interface VulnOptions extends ReportCommandOptions {
  /** Skip the vulnerability database query. */
  offline: boolean;
  /** Defaults to the npm registry advisory endpoint. */
  database?: VulnerabilityDatabase;
}

/** Risky patterns in source plus known-vulnerable dependencies. */
export async function runVuln(options: VulnOptions): Promise<ExitCode> {
  const db = options.offline ? null : (options.database ?? new NpmAdvisoryDatabase(process.env.SWEEPR_REGISTRY_URL));
  return runReportCommand("vuln", options, db);
}
