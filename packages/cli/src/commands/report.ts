import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  ConfigurationError,
  errorMessage,
  exitStatus,
  resolveConfig,
  runAnalysis,
  SeveritySchema,
  type RunMode,
  type VulnerabilityDatabase,
} from "@sweepr/engine";
import { UsageError } from "../args.js";
import { FORMATS, formatReport, isOutputFormat, type OutputFormat } from "../formatter.js";

export interface ReportCommandOptions {
  path: string;
  format?: string;
  output?: string;
  failOn?: string;
  color?: boolean;
}

/** Exit codes: 0 clean, 1 a finding reached the fail-on threshold, 2 configuration error. */
export type ExitCode = 0 | 1 | 2;

/** An explicit format wins; otherwise `.csv` output files get CSV. */
export function resolveFormat(format: string | undefined, output: string | undefined): OutputFormat {
  if (format !== undefined) {
    if (!isOutputFormat(format)) {
      throw new UsageError(`invalid format '${format}'. Must be one of: ${FORMATS.join(", ")}`);
    }
    return format;
  }
  return output?.toLowerCase().endsWith(".csv") ? "csv" : "table";
}

export async function runReportCommand(
  mode: RunMode,
  options: ReportCommandOptions,
  vulnerabilityDb: VulnerabilityDatabase | null,
): Promise<ExitCode> {
  const format = resolveFormat(options.format, options.output);
  const targetPath = resolve(options.path);
  const config = resolveConfig(targetPath);

  if (options.failOn !== undefined) {
    const parsed = SeveritySchema.safeParse(options.failOn);
    if (!parsed.success) {
      throw new UsageError(`invalid --fail-on '${options.failOn}'. Must be one of: ${SeveritySchema.options.join(", ")}`);
    }
    config.fail_on = parsed.data;
  }

  let result;
  try {
    result = await runAnalysis({ root: targetPath, mode, config, vulnerabilityDb });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`[sweepr] Configuration error: ${err.message}\n`);
      return 2;
    }
    throw err;
  }

  // Write to file or stdout
  if (options.output) {
    const report = formatReport(result, { format, color: false });
    try {
      writeFileSync(resolve(options.output), report);
      process.stderr.write(`[sweepr] Report written to ${options.output}\n`);
    } catch (err) {
      process.stderr.write(`[sweepr] Error: could not write to ${options.output}: ${errorMessage(err)}\n`);
      return 2;
    }
  } else {
    process.stdout.write(formatReport(result, { format, color: options.color ?? false }));
  }

  return exitStatus(result.findings, config.fail_on);
}
