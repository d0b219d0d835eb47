import { runReportCommand, type ExitCode, type ReportCommandOptions } from "./report.js";

export type CleanOptions = ReportCommandOptions;

/** Dead code, unused classes and packages, unreachable modules. */
export async function runClean(options: CleanOptions): Promise<ExitCode> {
  return runReportCommand("clean", options, null);
}
