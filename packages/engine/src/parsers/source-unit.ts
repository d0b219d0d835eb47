import type ts from "typescript";
import type { RootNode } from "@vue/compiler-dom";
import type { Root } from "postcss";

export type Dialect = "module-script" | "component" | "stylesheet";
export type ScriptLang = "ts" | "tsx" | "js" | "jsx";
export type StyleLang = "css" | "scss";

/**
 * Every tree keeps a line offset: tree-local line N is file line N + lineOffset.
 * Columns are only exact on lines after the first.
 */
export interface ScriptTree {
  sourceFile: ts.SourceFile;
  lineOffset: number;
  lang: ScriptLang;
  /** `<script setup>`: top-level bindings are visible to the template. */
  setup: boolean;
}

export interface TemplateTree {
  root: RootNode;
  lineOffset: number;
}

export interface StyleTree {
  root: Root;
  lineOffset: number;
  lang: StyleLang;
  /** `<style scoped>` / CSS modules: classes only apply to this unit. */
  scoped: boolean;
}

/**
 * One logical file. A component holds up to three kinds of subtree that share
 * one resolution scope; a module script has a single script tree; a
 * stylesheet a single style tree.
 */
export interface SourceUnit {
  path: string;
  dialect: Dialect;
  text: string;
  scripts: ScriptTree[];
  template: TemplateTree | null;
  styles: StyleTree[];
}

export interface Span {
  line: number;
  column: number;
  endLine: number;
}
