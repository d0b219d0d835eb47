import { getAllRules, getRulesForMode, RunModeSchema } from "@sweepr/engine";
import { UsageError } from "../args.js";
import { formatRulesTable } from "../formatter.js";

export function runRules(mode?: string, color = false): void {
  let rules = getAllRules();

  if (mode !== undefined) {
    const parsed = RunModeSchema.safeParse(mode);
    if (!parsed.success) {
      throw new UsageError(`invalid mode '${mode}'. Must be one of: ${RunModeSchema.options.join(", ")}`);
    }
    rules = getRulesForMode(parsed.data);
  }

  process.stdout.write(formatRulesTable(rules, color));
}
