/**
 * Module specifier resolution against the discovered unit set.
 *
 * Only files that were discovered resolve to units; everything else is a
 * package, a builtin, a framework virtual module, an asset or unresolved.
 */

import { builtinModules } from "node:module";
import { posix } from "node:path";
import type { ModuleRequestKind } from "../extract/types.js";
import { normalizePath } from "../glob.js";

export type Resolution =
  | { kind: "unit"; path: string }
  | { kind: "package"; name: string }
  | { kind: "builtin" }
  | { kind: "virtual" }
  | { kind: "asset" }
  | { kind: "unresolved" };

export interface ResolverOptions {
  /** Alias → project-relative directory. Merged over the defaults. */
  aliases: Record<string, string>;
  srcDir: string;
}

const EXTENSIONS = [".ts", ".tsx", ".js", ".jsx", ".mjs", ".mts", ".cjs", ".cts", ".vue", ".css", ".scss"];

/** `./x.js` written in TS sources refers to `./x.ts`. */
const JS_TO_TS: Record<string, string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

const ASSET_EXTENSIONS = new Set([
  ".png", ".jpg", ".jpeg", ".gif", ".svg", ".webp", ".avif", ".ico", ".bmp",
  ".woff", ".woff2", ".ttf", ".otf", ".eot",
  ".mp3", ".mp4", ".webm", ".ogg", ".wav",
  ".json", ".yaml", ".yml", ".md", ".txt", ".html", ".wasm",
  ".sass", ".less", ".styl", ".pcss",
]);

const BUILTINS = new Set(builtinModules);

export function packageName(specifier: string): string {
  const parts = specifier.split("/");
  if (specifier.startsWith("@") && parts.length > 1) return `${parts[0]}/${parts[1]}`;
  return parts[0] ?? specifier;
}

export function defaultAliases(srcDir: string): Record<string, string> {
  const src = normalizePath(srcDir) || ".";
  return { "~": src, "@": src, "~~": ".", "@@": "." };
}

export class ModuleResolver {
  private readonly aliases: Array<[string, string]>;

  constructor(
    private readonly units: ReadonlySet<string>,
    options: ResolverOptions,
  ) {
    const merged = { ...defaultAliases(options.srcDir), ...options.aliases };
    // Longest first so `~~` wins over `~`
    this.aliases = Object.entries(merged).sort((a, b) => b[0].length - a[0].length);
  }

  resolve(fromUnit: string, rawSpecifier: string, kind: ModuleRequestKind = "import"): Resolution {
    // Query and hash suffixes; a leading `#` is part of the name
    const specifier = rawSpecifier.replace(/(.)[?#].*$/, "$1");
    if (!specifier) return { kind: "unresolved" };

    if (specifier.startsWith("node:")) return { kind: "builtin" };

    if (specifier.startsWith("./") || specifier.startsWith("../") || specifier === "." || specifier === "..") {
      return this.resolvePath(posix.join(posix.dirname(fromUnit), specifier));
    }

    if (specifier.startsWith("/")) return this.resolvePath(specifier.slice(1));

    for (const [alias, target] of this.aliases) {
      if (specifier === alias || specifier.startsWith(`${alias}/`)) {
        return this.resolvePath(posix.join(target, specifier.slice(alias.length)));
      }
    }

    if (specifier.startsWith("#") || specifier.startsWith("virtual:") || specifier.startsWith("\0")) {
      return { kind: "virtual" };
    }

    // Stylesheets resolve bare paths relative to themselves; `~pkg` is a package
    if (kind === "css-import") {
      if (specifier.startsWith("~")) return { kind: "package", name: packageName(specifier.slice(1)) };
      const local = this.resolvePath(posix.join(posix.dirname(fromUnit), specifier));
      if (local.kind === "unit") return local;
    }

    const name = packageName(specifier);
    if (BUILTINS.has(name)) return { kind: "builtin" };
    return { kind: "package", name };
  }

  private resolvePath(joined: string): Resolution {
    const base = posix.normalize(joined).replace(/\/$/, "");
    if (base.startsWith("../") || base === "..") return { kind: "unresolved" };

    for (const candidate of this.candidates(base)) {
      if (this.units.has(candidate)) return { kind: "unit", path: candidate };
    }

    if (ASSET_EXTENSIONS.has(posix.extname(base).toLowerCase())) return { kind: "asset" };
    return { kind: "unresolved" };
  }

  private candidates(base: string): string[] {
    const out = [base];
    const ext = posix.extname(base);
    const mapped = JS_TO_TS[ext];
    if (mapped) {
      const stem = base.slice(0, -ext.length);
      for (const replacement of mapped) out.push(stem + replacement);
    }
    for (const extension of EXTENSIONS) out.push(base + extension);
    for (const extension of EXTENSIONS) out.push(`${base}/index${extension}`);

    // SCSS partials: `@use "vars"` → `_vars.scss`
    const dir = posix.dirname(base);
    const partial = `${dir === "." ? "" : `${dir}/`}_${posix.basename(base)}`;
    out.push(partial, `${partial}.scss`, `${partial}.css`);
    return out;
  }
}
