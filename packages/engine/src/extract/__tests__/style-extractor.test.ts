import { describe, it, expect } from "vitest";
import { parseUnit } from "../../parsers/index.js";
import { extractUnit, type UnitExtraction } from "../index.js";
import { selectorClasses } from "../style-extractor.js";

function extract(path: string, text: string): UnitExtraction {
  return extractUnit(parseUnit(path, text), { reportBlockScoped: false, reportConsole: true });
}

function classIds(out: UnitExtraction): string[] {
  return out.symbols.flatMap((s) => (s.kind === "CssClass" ? [s.id] : []));
}

const SCOPED = `<template><div /></template>
<style scoped lang="scss">
.card {
  &__title { font-weight: bold; }
  &:hover { color: red; }
  .inner { margin: 0; }
  :deep(.child) { padding: 0; }
}
@keyframes spin { from { opacity: 0; } to { opacity: 1; } }
.a, .b > .c { color: blue; }
@import "./vars";
.x { @extend .y; }
</style>
`;

describe("extractStyle", () => {
  it("flattens nesting and scopes classes to the component", () => {
    expect(classIds(extract("c.vue", SCOPED))).toEqual([
      "c.vue#scoped-css:card",
      "c.vue#scoped-css:card__title",
      "c.vue#scoped-css:inner",
      "c.vue#css:child",
      "c.vue#scoped-css:a",
      "c.vue#scoped-css:b",
      "c.vue#scoped-css:c",
      "c.vue#scoped-css:x",
    ]);
  });

  it("turns @extend into a class usage and @import into a module request", () => {
    const out = extract("c.vue", SCOPED);
    expect(out.references.filter((r) => r.kind === "css-class").map((r) => r.name)).toEqual(["y"]);
    expect(out.moduleRequests.map((r) => [r.specifier, r.kind])).toEqual([["./vars", "css-import"]]);
  });

  it("reports declarations on the file line", () => {
    const out = extract("c.vue", SCOPED);
    const title = out.symbols.find((s) => s.id === "c.vue#scoped-css:card__title");
    expect(title?.span.line).toBe(4);
  });

  it("keeps stylesheet classes global", () => {
    const out = extract("assets/main.css", ".btn { color: red; }\n.btn.primary { color: blue; }\n@import url(\"./reset.css\");\n");
    expect(classIds(out)).toEqual(["assets/main.css#css:btn", "assets/main.css#css:primary"]);
    expect(out.moduleRequests.map((r) => r.specifier)).toEqual(["./reset.css"]);
  });

  it("resolves v-bind() in declaration values against script bindings", () => {
    const out = extract(
      "components/Swatch.vue",
      [
        '<template><p class="a" /></template>',
        "<script setup>",
        'const color = "red";',
        "const size = { gap: 1 };",
        "const spare = 0;",
        "</script>",
        "<style scoped>",
        ".a { color: v-bind(color); margin: v-bind('size.gap'); }",
        "</style>",
        "",
      ].join("\n"),
    );
    const refs = out.references.flatMap((r) => (r.kind === "identifier" ? [[r.name, r.resolvedId, r.span.line]] : []));
    expect(refs).toEqual([
      ["color", "components/Swatch.vue#local:color", 8],
      ["size", "components/Swatch.vue#local:size", 8],
    ]);
  });

  it("ignores remote and built-in module imports", () => {
    const out = extract("a.scss", "@use \"sass:math\";\n@import \"https://fonts.example.test/css\";\n");
    expect(out.moduleRequests).toEqual([]);
  });
});

describe("selectorClasses", () => {
  it("marks classes inside :global as unscoped", () => {
    expect(selectorClasses(".a :global(.b)")).toEqual([
      { name: "a", unscoped: false },
      { name: "b", unscoped: true },
    ]);
  });

  it("skips interpolated class names", () => {
    expect(selectorClasses(".icon-#{$name}, .plain")).toEqual([{ name: "plain", unscoped: false }]);
  });
});
