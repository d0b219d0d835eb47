import { describe, it, expect } from "vitest";
import { ParseError } from "../../errors.js";
import { parseUnit } from "../index.js";
import { parseExpression, rootExpression } from "../script-parser.js";
import { styleLangOf } from "../style-parser.js";

const COMPONENT = `<template>
  <div class="card">{{ title }}</div>
</template>

<script setup lang="ts">
const title = "Hello";
</script>

<style scoped lang="scss">
.card { color: red; }
</style>
`;

function parseFailure(path: string, text: string): ParseError {
  try {
    parseUnit(path, text);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error("expected a ParseError");
}

describe("parseUnit", () => {
  it("parses a module script into one tree", () => {
    const unit = parseUnit("utils/sum.ts", "export const sum = (a: number, b: number) => a + b;\n");
    expect(unit.dialect).toBe("module-script");
    expect(unit.scripts).toHaveLength(1);
    expect(unit.scripts[0]?.lang).toBe("ts");
    expect(unit.scripts[0]?.lineOffset).toBe(0);
    expect(unit.template).toBeNull();
    expect(unit.styles).toEqual([]);
  });

  it("parses a stylesheet into one style tree", () => {
    const unit = parseUnit("assets/main.scss", ".a { .b { color: red; } }\n");
    expect(unit.dialect).toBe("stylesheet");
    expect(unit.styles).toHaveLength(1);
    expect(unit.styles[0]?.scoped).toBe(false);
    expect(unit.styles[0]?.lang).toBe("scss");
  });

  it("splits a component into script, template and style subtrees", () => {
    const unit = parseUnit("components/Card.vue", COMPONENT);
    expect(unit.dialect).toBe("component");
    expect(unit.scripts).toHaveLength(1);
    expect(unit.scripts[0]?.setup).toBe(true);
    expect(unit.scripts[0]?.lang).toBe("ts");
    // <script setup> content starts on line 5
    expect(unit.scripts[0]?.lineOffset).toBe(4);
    expect(unit.template).not.toBeNull();
    expect(unit.styles).toHaveLength(1);
    expect(unit.styles[0]?.scoped).toBe(true);
    expect(unit.styles[0]?.lineOffset).toBe(8);
  });

  it("skips style blocks in unsupported languages", () => {
    const unit = parseUnit("components/A.vue", "<template><div /></template>\n<style lang=\"less\">.a { .b; }</style>\n");
    expect(unit.styles).toEqual([]);
  });

  it("reports script syntax errors with the file line", () => {
    const err = parseFailure("components/Broken.vue", "<template><div /></template>\n<script>\nconst = 1;\n</script>\n");
    expect(err.unit).toBe("components/Broken.vue");
    expect(err.position.line).toBe(3);
  });

  it("reports module-script syntax errors", () => {
    const err = parseFailure("a.ts", "let x = ;\n");
    expect(err.position.line).toBe(1);
    expect(err.reason).toBe("Expression expected.");
  });

  it("reports stylesheet syntax errors", () => {
    const err = parseFailure("a.css", ".a {\n  color: red;\n");
    expect(err.position.line).toBe(1);
    expect(err.reason).toBe("Unclosed block");
  });

  it("rejects files that are not source units", () => {
    expect(parseFailure("notes.md", "# hi").reason).toBe("Unsupported file type");
  });
});

describe("parseExpression", () => {
  it("returns the root expression of a template expression", () => {
    const sf = parseExpression("a ? 'x' : 'y'");
    expect(sf).not.toBeNull();
    const root = sf ? rootExpression(sf) : null;
    expect(root?.getText(sf ?? undefined)).toBe("a ? 'x' : 'y'");
  });

  it("returns null when the expression does not parse", () => {
    expect(parseExpression("a +")).toBeNull();
  });

  it("accepts several statements in statement mode", () => {
    expect(parseExpression("count++; emit('done')", "statements")).not.toBeNull();
  });
});

describe("styleLangOf", () => {
  it("maps block languages", () => {
    expect(styleLangOf(undefined)).toBe("css");
    expect(styleLangOf("postcss")).toBe("css");
    expect(styleLangOf("scss")).toBe("scss");
    expect(styleLangOf("sass")).toBeNull();
    expect(styleLangOf("less")).toBeNull();
  });
});
