import type { SourceUnit } from "../parsers/source-unit.js";
import {
  collectScriptReferences,
  createUnitContext,
  declareComponentDefault,
  declareTopLevel,
  type ExtractOptions,
} from "./script-extractor.js";
import { extractStyle } from "./style-extractor.js";
import { extractTemplate } from "./template-extractor.js";
import { emptyExtraction, type UnitExtraction } from "./types.js";

export type { ExtractOptions } from "./script-extractor.js";
export * from "./types.js";

/**
 * Emit every declaration and reference record of one parsed unit.
 * Declarations of all script blocks are recorded before any reference is
 * resolved so the template and both script blocks see one scope.
 */
export function extractUnit(unit: SourceUnit, options: ExtractOptions): UnitExtraction {
  const out = emptyExtraction(unit.path);
  const ctx = createUnitContext(out, options);

  if (unit.dialect === "component") declareComponentDefault(ctx);
  for (const script of unit.scripts) declareTopLevel(ctx, script);
  for (const script of unit.scripts) collectScriptReferences(ctx, script);
  if (unit.template) extractTemplate(ctx, unit.template);
  for (const style of unit.styles) extractStyle(ctx, style);

  return out;
}
