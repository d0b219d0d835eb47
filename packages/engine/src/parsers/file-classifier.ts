/**
 * File classifier.
 *
 * Maps a path to the dialect it is parsed as. Anything unclassified is not a
 * source unit and never reaches the parser.
 */

import type { Dialect, ScriptLang, StyleLang } from "./source-unit.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function getExtension(filePath: string): string {
  const slash = filePath.lastIndexOf("/");
  const lastDot = filePath.lastIndexOf(".");
  if (lastDot <= slash + 1 || lastDot === filePath.length - 1) return "";
  return filePath.slice(lastDot).toLowerCase();
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FileClassification =
  | { dialect: "component" }
  | { dialect: "module-script"; lang: ScriptLang }
  | { dialect: "stylesheet"; lang: StyleLang };

// ---------------------------------------------------------------------------
// Extension -> dialect mapping
// ---------------------------------------------------------------------------

const EXT_MAP: Record<string, FileClassification> = {
  ".vue": { dialect: "component" },
  ".ts": { dialect: "module-script", lang: "ts" },
  ".mts": { dialect: "module-script", lang: "ts" },
  ".cts": { dialect: "module-script", lang: "ts" },
  ".tsx": { dialect: "module-script", lang: "tsx" },
  ".js": { dialect: "module-script", lang: "js" },
  ".mjs": { dialect: "module-script", lang: "js" },
  ".cjs": { dialect: "module-script", lang: "js" },
  ".jsx": { dialect: "module-script", lang: "jsx" },
  ".css": { dialect: "stylesheet", lang: "css" },
  ".scss": { dialect: "stylesheet", lang: "scss" },
};

export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set(Object.keys(EXT_MAP));

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

export function classifyFile(filePath: string): FileClassification | null {
  // Type declarations carry no runtime code
  if (/\.d\.[cm]?ts$/i.test(filePath)) return null;
  return EXT_MAP[getExtension(filePath)] ?? null;
}

export function isDialect(filePath: string, dialect: Dialect): boolean {
  return classifyFile(filePath)?.dialect === dialect;
}

/** `nuxt.config.ts`, `vite.config.mjs` and the like: units that register packages by name. */
export function isFrameworkConfig(filePath: string): boolean {
  const base = filePath.slice(filePath.lastIndexOf("/") + 1);
  return /^(?:nuxt|vite|vitest|app|tailwind|postcss|uno)\.config\.[cm]?[jt]s$/.test(base);
}
