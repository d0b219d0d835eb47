import { ParseError } from "../errors.js";
import { classifyFile } from "./file-classifier.js";
import { parseComponent } from "./component-parser.js";
import { parseScript } from "./script-parser.js";
import { parseStyle } from "./style-parser.js";
import type { SourceUnit } from "./source-unit.js";

/**
 * Parse one file into a dialect-tagged SourceUnit.
 * Throws ParseError on malformed input.
 */
export function parseUnit(unitPath: string, text: string): SourceUnit {
  const classification = classifyFile(unitPath);
  if (!classification) {
    throw new ParseError(unitPath, { line: 1, column: 1 }, "Unsupported file type");
  }

  switch (classification.dialect) {
    case "component":
      return parseComponent(unitPath, text);
    case "module-script":
      return {
        path: unitPath,
        dialect: "module-script",
        text,
        scripts: [{ sourceFile: parseScript(unitPath, text, classification.lang), lineOffset: 0, lang: classification.lang, setup: false }],
        template: null,
        styles: [],
      };
    case "stylesheet":
      return {
        path: unitPath,
        dialect: "stylesheet",
        text,
        scripts: [],
        template: null,
        styles: [{ root: parseStyle(unitPath, text, classification.lang), lineOffset: 0, lang: classification.lang, scoped: false }],
      };
  }
}
