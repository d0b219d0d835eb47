#!/usr/bin/env node

import { errorMessage } from "@sweepr/engine";
import { parseArgs, UsageError } from "./args.js";
import { runClean } from "./commands/clean.js";
import { runRules } from "./commands/rules.js";
import { runVuln } from "./commands/vuln.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36msweepr\x1b[0m: dead-code and risky-pattern scanner for Vue and Nuxt projects
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  sweepr clean [path]               Report unused code, classes, packages and modules (default: .)
  sweepr vuln [path]                Report risky patterns and vulnerable dependencies (default: .)
  sweepr rules                      List all rules
  sweepr version                    Print version

\x1b[1mREPORT OPTIONS\x1b[0m
  --format <fmt>               Output: table, csv, json (default: table; csv when --output ends in .csv)
  --output, -o <file>          Write report to file
  --fail-on <severity>         Exit 1 if a finding is at least this severe (default: fail_on from .sweepr.yml, else high)
  --offline                    vuln: skip the vulnerability database query
  --no-color                   Plain table output

\x1b[1mRULES OPTIONS\x1b[0m
  --mode <mode>                Only rules of one run mode: clean, vuln

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet, -q                  Suppress info/warn output

\x1b[1mEXIT CODES\x1b[0m
  0  no finding reached the fail-on severity
  1  at least one finding did
  2  configuration or usage error

\x1b[1mENVIRONMENT\x1b[0m
  SWEEPR_LOG_LEVEL             Log level: debug, info, warn, error, silent
  SWEEPR_REGISTRY_URL          Registry used for advisory lookups

`);
}

async function main(rawArgs: string[]): Promise<number> {
  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`sweepr v${VERSION}\n`);
    return 0;
  }

  const { command, args, positional } = parseArgs(rawArgs);
  const color = process.stdout.isTTY === true && args["no-color"] !== "true" && !process.env.NO_COLOR;

  switch (command) {
    case "version":
      process.stdout.write(`sweepr v${VERSION}\n`);
      return 0;

    case "rules":
      runRules(args["mode"], color);
      return 0;

    case "clean":
      return runClean({
        path: positional[0] ?? ".",
        format: args["format"],
        output: args["output"],
        failOn: args["fail-on"],
        color,
      });

    case "vuln":
      return runVuln({
        path: positional[0] ?? ".",
        format: args["format"],
        output: args["output"],
        failOn: args["fail-on"],
        offline: args["offline"] === "true",
        color,
      });

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof UsageError) {
      process.stderr.write(`[sweepr] Error: ${err.message}\n`);
      process.exitCode = 2;
      return;
    }
    process.stderr.write(`[sweepr] Fatal: ${errorMessage(err)}\n`);
    process.exitCode = 2;
  },
);
