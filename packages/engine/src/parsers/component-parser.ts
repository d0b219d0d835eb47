/**
 * Component (.vue) parsing.
 *
 * @vue/compiler-sfc splits the file into blocks; each block is then parsed by
 * its own dialect parser and attached to the same SourceUnit.
 */

import { parse as parseSfc, type SFCBlock } from "@vue/compiler-sfc";
import { parse as parseTemplate, type CompilerError } from "@vue/compiler-dom";
import { ParseError } from "../errors.js";
import { logger } from "../logger.js";
import { parseScript } from "./script-parser.js";
import { parseStyle, styleLangOf } from "./style-parser.js";
import type { ScriptLang, ScriptTree, SourceUnit, StyleTree, TemplateTree } from "./source-unit.js";

function scriptLangOf(lang: string | undefined): ScriptLang | null {
  if (!lang || lang === "js") return "js";
  if (lang === "ts" || lang === "tsx" || lang === "jsx") return lang;
  return null;
}

function blockOffset(block: SFCBlock): number {
  return block.loc.start.line - 1;
}

function parseTemplateBlock(unitPath: string, content: string, lineOffset: number): TemplateTree {
  const errors: CompilerError[] = [];
  const root = parseTemplate(content, {
    comments: false,
    onError: (err) => { errors.push(err); },
  });
  const first = errors[0];
  if (first) {
    const start = first.loc?.start;
    throw new ParseError(
      unitPath,
      { line: (start?.line ?? 1) + lineOffset, column: start?.column ?? 1 },
      first.message,
    );
  }
  return { root, lineOffset };
}

export function parseComponent(unitPath: string, text: string): SourceUnit {
  const { descriptor, errors } = parseSfc(text, { filename: unitPath, sourceMap: false });

  const first = errors[0];
  if (first) {
    const start = "loc" in first ? first.loc?.start : undefined;
    throw new ParseError(unitPath, { line: start?.line ?? 1, column: start?.column ?? 1 }, first.message);
  }

  const scripts: ScriptTree[] = [];
  for (const block of [descriptor.script, descriptor.scriptSetup]) {
    if (!block) continue;
    const lang = scriptLangOf(block.lang);
    if (!lang) {
      logger.debug(`${unitPath}: skipping <script lang="${block.lang}">`);
      continue;
    }
    const lineOffset = blockOffset(block);
    scripts.push({
      sourceFile: parseScript(unitPath, block.content, lang, lineOffset),
      lineOffset,
      lang,
      setup: block.setup !== undefined && block.setup !== false,
    });
  }

  let template: TemplateTree | null = null;
  if (descriptor.template) {
    const block = descriptor.template;
    if (block.lang && block.lang !== "html") {
      logger.debug(`${unitPath}: skipping <template lang="${block.lang}">`);
    } else {
      template = parseTemplateBlock(unitPath, block.content, blockOffset(block));
    }
  }

  const styles: StyleTree[] = [];
  for (const block of descriptor.styles) {
    const lang = styleLangOf(block.lang);
    if (!lang) {
      logger.debug(`${unitPath}: skipping <style lang="${block.lang}">`);
      continue;
    }
    const lineOffset = blockOffset(block);
    styles.push({
      root: parseStyle(unitPath, block.content, lang, lineOffset),
      lineOffset,
      lang,
      scoped: Boolean(block.scoped) || Boolean(block.module),
    });
  }

  return { path: unitPath, dialect: "component", text, scripts, template, styles };
}
