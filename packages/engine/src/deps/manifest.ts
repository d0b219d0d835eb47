/**
 * Package manifest loading: `package.json` dependencies become
 * PackageDependency symbols.
 */

import { z } from "zod";
import type { FileSystem } from "../discovery.js";
import { errorMessage } from "../errors.js";
import { symbolId, type DependencySection, type PackageDependencySymbol } from "../extract/types.js";
import { logger } from "../logger.js";

export const MANIFEST_FILE = "package.json";

const manifestSchema = z
  .object({
    dependencies: z.record(z.string()).optional(),
    devDependencies: z.record(z.string()).optional(),
  })
  .passthrough();

/** 1-based line of `"name":` inside the given section, or 1. */
function lineOf(lines: readonly string[], section: string, name: string): number {
  const sectionIdx = lines.findIndex((l) => l.includes(`"${section}"`));
  const key = `"${name}"`;
  for (let i = Math.max(0, sectionIdx); i < lines.length; i++) {
    if (lines[i]?.trimStart().startsWith(key)) return i + 1;
  }
  return 1;
}

/** Parse manifest text. Throws on invalid JSON or an invalid shape. */
export function parseManifest(text: string): PackageDependencySymbol[] {
  const data = manifestSchema.parse(JSON.parse(text));
  const lines = text.split("\n");
  const out: PackageDependencySymbol[] = [];

  const add = (section: DependencySection, key: string, deps: Record<string, string> | undefined): void => {
    for (const [name, version] of Object.entries(deps ?? {})) {
      const line = lineOf(lines, key, name);
      out.push({
        kind: "PackageDependency",
        id: symbolId(MANIFEST_FILE, "package", name),
        name,
        unit: MANIFEST_FILE,
        span: { line, column: 1, endLine: line },
        visibility: "exported",
        version,
        section,
      });
    }
  };

  add("runtime", "dependencies", data.dependencies);
  add("dev", "devDependencies", data.devDependencies);
  return out;
}

/**
 * Read the project's manifest. A missing or unreadable manifest yields no
 * dependencies.
 */
export async function loadManifest(fs: FileSystem, root: string): Promise<PackageDependencySymbol[]> {
  if (!(await fs.exists(root, MANIFEST_FILE))) {
    logger.warn(`No ${MANIFEST_FILE} found; dependency checks are skipped`);
    return [];
  }
  try {
    return parseManifest(await fs.readFile(root, MANIFEST_FILE));
  } catch (err) {
    logger.warn(`Could not read ${MANIFEST_FILE}: ${errorMessage(err)}`);
    return [];
  }
}

/** `^1.2.3` → `1.2.3`; ranges that name no version (`*`, `latest`, tags, URLs) give null. */
export function concreteVersion(range: string): string | null {
  const match = /(\d+)(?:\.(\d+|x|\*))?(?:\.(\d+|x|\*))?(-[\w.]+)?/.exec(range);
  if (!match || /^(?:file|link|git|https?|workspace):/.test(range)) return null;
  const part = (value: string | undefined): string => (value === undefined || value === "x" || value === "*" ? "0" : value);
  return `${match[1]}.${part(match[2])}.${part(match[3])}${match[4] ?? ""}`;
}
