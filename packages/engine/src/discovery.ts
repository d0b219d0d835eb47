/**
 * File discovery and file access.
 *
 * The engine only touches the disk through the FileSystem capability so the
 * core can run against an in-memory tree in tests.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { join, relative, extname } from "node:path";
import { matchesAny, normalizePath } from "./glob.js";
import { logger } from "./logger.js";
import { errorMessage } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ListOptions {
  /** Glob patterns to ignore (from .sweepr.yml) */
  ignore: readonly string[];
  /** Lower-case extensions (with dot) to include */
  extensions: ReadonlySet<string>;
  maxFileSizeKB?: number;
}

export interface FileSystem {
  /** Project-relative paths with `/` separators, sorted. */
  listFiles(root: string, options: ListOptions): Promise<string[]>;
  readFile(root: string, relPath: string): Promise<string>;
  exists(root: string, relPath: string): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SKIP_DIRS = new Set([
  "node_modules", ".git", "dist", "build", "coverage",
  ".nuxt", ".output", ".vercel", ".netlify", ".cache",
  ".turbo", ".next", "out", ".data",
]);

const DEFAULT_MAX_FILE_SIZE_KB = 1024;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function wanted(relPath: string, options: ListOptions): boolean {
  if (!options.extensions.has(extname(relPath).toLowerCase())) return false;
  return !matchesAny(relPath, options.ignore);
}

// ---------------------------------------------------------------------------
// Node implementation
// ---------------------------------------------------------------------------

async function walk(root: string, dir: string, options: ListOptions, out: string[]): Promise<void> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    logger.warn(`Cannot read directory ${dir}: ${errorMessage(err)}`);
    return;
  }

  const maxBytes = (options.maxFileSizeKB ?? DEFAULT_MAX_FILE_SIZE_KB) * 1024;

  for (const entry of entries) {
    if (entry.name.startsWith(".") && entry.isDirectory()) continue;
    const abs = join(dir, entry.name);
    const rel = normalizePath(relative(root, abs));

    if (entry.isDirectory()) {
      if (SKIP_DIRS.has(entry.name)) continue;
      if (matchesAny(rel, options.ignore)) continue;
      await walk(root, abs, options, out);
    } else if (entry.isFile()) {
      if (!wanted(rel, options)) continue;
      try {
        const info = await stat(abs);
        if (info.size === 0 || info.size > maxBytes) {
          logger.debug(`Skipping ${rel} (${info.size} bytes)`);
          continue;
        }
      } catch (err) {
        logger.debug(`Skipping ${rel}: ${errorMessage(err)}`);
        continue;
      }
      out.push(rel);
    }
  }
}

export const nodeFileSystem: FileSystem = {
  async listFiles(root, options) {
    const files: string[] = [];
    await walk(root, root, options, files);
    return files.sort(compareStrings);
  },

  async readFile(root, relPath) {
    return readFile(join(root, relPath), "utf-8");
  },

  async exists(root, relPath) {
    try {
      await stat(join(root, relPath));
      return true;
    } catch {
      return false;
    }
  },
};

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

/**
 * A FileSystem over a fixed map of project-relative paths to contents.
 * The root argument is ignored.
 */
export function createMemoryFileSystem(files: Record<string, string>): FileSystem {
  const contents = new Map(Object.entries(files).map(([p, c]) => [normalizePath(p), c]));

  return {
    async listFiles(_root, options) {
      return [...contents.keys()]
        .filter((p) => !p.split("/").slice(0, -1).some((seg) => SKIP_DIRS.has(seg)))
        .filter((p) => wanted(p, options))
        .sort(compareStrings);
    },

    async readFile(_root, relPath) {
      const content = contents.get(normalizePath(relPath));
      if (content === undefined) throw new Error(`ENOENT: no such file '${relPath}'`);
      return content;
    },

    async exists(_root, relPath) {
      const path = normalizePath(relPath).replace(/\/$/, "");
      if (path === "" || path === ".") return true;
      if (contents.has(path)) return true;
      return [...contents.keys()].some((p) => p.startsWith(path + "/"));
    },
  };
}
