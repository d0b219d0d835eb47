/**
 * Glob matching for ignore lists and entry-point rules.
 *
 * Supports `*`, `**`, `?`, bare directory names ("node_modules") and path
 * prefixes ("public/vendor/"). Paths are project-relative with `/` separators.
 */

const globCache = new Map<string, RegExp>();

function escapeRegex(value: string): string {
  return value.replace(/[.+^${}()|[\]\\]/g, "\\$&");
}

export function normalizePath(value: string): string {
  const slashed = value.replace(/\\/g, "/");
  return slashed.startsWith("./") ? slashed.slice(2) : slashed;
}

function globToRegex(pattern: string): RegExp {
  const cached = globCache.get(pattern);
  if (cached) return cached;

  let regex = "^";
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    if (char === "*" && pattern[i + 1] === "*") {
      if (pattern[i + 2] === "/") {
        regex += "(?:.*/)?";
        i += 3;
      } else {
        regex += ".*";
        i += 2;
      }
      continue;
    }
    if (char === "*") {
      regex += "[^/]*";
    } else if (char === "?") {
      regex += "[^/]";
    } else {
      regex += escapeRegex(char);
    }
    i++;
  }
  regex += "$";

  const compiled = new RegExp(regex);
  globCache.set(pattern, compiled);
  return compiled;
}

export function isGlob(pattern: string): boolean {
  return /[*?]/.test(pattern);
}

/**
 * The directory part of a pattern before its first wildcard segment.
 * `pages/**` gives `pages`, `nuxt.config.*` gives `` (the root).
 */
export function staticPrefix(pattern: string): string {
  const segments = normalizePath(pattern).split("/");
  const fixed: string[] = [];
  for (const segment of segments) {
    if (isGlob(segment)) break;
    fixed.push(segment);
  }
  return fixed.join("/");
}

/**
 * Match a project-relative path against a pattern. Unanchored patterns
 * without a slash ("node_modules", "*.min.js") match at any depth; anchored
 * ones only match from the project root.
 */
export function matchesGlob(relPath: string, pattern: string, anchored = false): boolean {
  const path = normalizePath(relPath);
  const clean = normalizePath(pattern).replace(/\/$/, "");
  if (clean === "") return false;

  if (!isGlob(clean)) {
    if (!anchored && !clean.includes("/") && path.split("/").includes(clean)) return true;
    return path === clean || path.startsWith(clean + "/");
  }

  if (globToRegex(clean).test(path)) return true;
  if (!anchored && !clean.includes("/")) {
    const base = path.slice(path.lastIndexOf("/") + 1);
    return globToRegex(clean).test(base);
  }
  return false;
}

export function matchesAny(relPath: string, patterns: readonly string[], anchored = false): boolean {
  return patterns.some((p) => matchesGlob(relPath, p, anchored));
}
