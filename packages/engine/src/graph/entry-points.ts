/**
 * Entry-point rules.
 *
 * Without configured rules the framework conventions apply: routed pages,
 * layouts, plugins, route middleware, auto-registered components and
 * composables, server routes and the framework config files. Configured
 * rules replace the conventions, and each must point at something that
 * exists.
 */

import { posix } from "node:path";
import type { FileSystem } from "../discovery.js";
import { ConfigurationError } from "../errors.js";
import { matchesGlob, normalizePath, staticPrefix } from "../glob.js";
import { logger } from "../logger.js";

/** Relative to `src_dir`. */
export const CONVENTION_ENTRY_PATTERNS = [
  "app.vue",
  "error.vue",
  "app.config.*",
  "main.*",
  "router.options.*",
  "pages/**",
  "layouts/**",
  "plugins/**",
  "middleware/**",
  "components/**",
  "composables/**",
  "utils/**",
  "server/**",
];

/** Relative to the project root. */
export const ROOT_ENTRY_PATTERNS = [
  "nuxt.config.*",
  "vite.config.*",
  "vitest.config.*",
  "tailwind.config.*",
  "postcss.config.*",
  "uno.config.*",
  "server/**",
];

export function conventionPatterns(srcDir: string): string[] {
  const src = normalizePath(srcDir).replace(/\/$/, "");
  const underSrc =
    src === "" || src === "." ? CONVENTION_ENTRY_PATTERNS : CONVENTION_ENTRY_PATTERNS.map((p) => posix.join(src, p));
  return [...new Set([...underSrc, ...ROOT_ENTRY_PATTERNS])];
}

/**
 * Check configured rules before anything is parsed.
 * Throws ConfigurationError when a rule's fixed prefix does not exist.
 */
export async function validateEntryRules(
  rules: readonly string[],
  fs: FileSystem,
  root: string,
): Promise<void> {
  for (const rule of rules) {
    const prefix = staticPrefix(rule);
    if (prefix === "") continue;
    if (!(await fs.exists(root, prefix))) {
      throw new ConfigurationError(`Entry point rule '${rule}' refers to '${prefix}', which does not exist`);
    }
  }
}

export function selectEntryUnits(
  units: readonly string[],
  configured: readonly string[],
  srcDir: string,
): string[] {
  const patterns = configured.length > 0 ? configured : conventionPatterns(srcDir);
  const entries = units.filter((unit) => patterns.some((p) => matchesGlob(unit, p, true)));
  if (entries.length === 0) {
    logger.warn("No entry points matched; unreachable-module reporting is off for this run");
  }
  return entries;
}
