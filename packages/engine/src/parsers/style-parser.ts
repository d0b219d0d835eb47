/**
 * Style parsing with PostCSS. SCSS goes through the postcss-scss syntax so
 * nesting, `//` comments and interpolation survive.
 */

import postcss, { CssSyntaxError, type Root } from "postcss";
import scss from "postcss-scss";
import { ParseError } from "../errors.js";
import type { StyleLang } from "./source-unit.js";

export function parseStyle(unitPath: string, text: string, lang: StyleLang, lineOffset = 0): Root {
  let parsed;
  try {
    parsed = lang === "scss" ? scss.parse(text, { from: unitPath }) : postcss.parse(text, { from: unitPath });
  } catch (err) {
    if (err instanceof CssSyntaxError) {
      throw new ParseError(
        unitPath,
        { line: (err.line ?? 1) + lineOffset, column: err.column ?? 1 },
        err.reason,
      );
    }
    throw err;
  }
  if (parsed.type !== "root") {
    throw new ParseError(unitPath, { line: 1 + lineOffset, column: 1 }, "Expected a stylesheet root");
  }
  return parsed;
}

/** Style languages a component `<style lang="…">` block may use that we can parse. */
export function styleLangOf(lang: string | undefined): StyleLang | null {
  if (!lang || lang === "css" || lang === "postcss" || lang === "pcss") return "css";
  if (lang === "scss") return "scss";
  return null;
}
