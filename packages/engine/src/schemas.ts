import { z } from "zod";

export const SeveritySchema = z.enum([
  "critical",
  "high",
  "medium",
  "low",
  "unused",
  "possibly-unused",
  "info",
]);

export type Severity = z.infer<typeof SeveritySchema>;

/** Most severe first. Index 0 is `critical`. */
export const SEVERITY_ORDER: readonly Severity[] = SeveritySchema.options;

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

/** True when `severity` is at least as severe as `threshold`. */
export function meetsSeverity(severity: Severity, threshold: Severity): boolean {
  return severityRank(severity) <= severityRank(threshold);
}

export const CategorySchema = z.enum([
  "UnusedImport",
  "UnusedExport",
  "UnusedVariable",
  "UnusedFunction",
  "UnusedCssClass",
  "UnusedPackage",
  "UnreachableModule",
  "ConsoleStatement",
  "Vulnerability",
  "KnownVulnerability",
  "ParseError",
  "UnresolvedImport",
  "AuditUnavailable",
]);

export type Category = z.infer<typeof CategorySchema>;

export const FindingSchema = z.object({
  ruleId: z.string(),
  category: CategorySchema,
  severity: SeveritySchema,
  title: z.string(),
  description: z.string(),
  filePath: z.string(),
  startLine: z.number().int().nonnegative(),
  endLine: z.number().int().nonnegative(),
  column: z.number().int().nonnegative(),
  symbol: z.string().optional(),
  codeSnippet: z.string(),
  rationale: z.string(),
});

export type Finding = z.infer<typeof FindingSchema>;

export const RunModeSchema = z.enum(["clean", "vuln"]);

export type RunMode = z.infer<typeof RunModeSchema>;
