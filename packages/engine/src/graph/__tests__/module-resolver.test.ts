import { describe, it, expect } from "vitest";
import { ModuleResolver, packageName, defaultAliases } from "../module-resolver.js";

const UNITS = new Set([
  "app.vue",
  "components/Card.vue",
  "components/index.ts",
  "composables/useUser.ts",
  "utils/format.ts",
  "assets/styles/_vars.scss",
  "assets/styles/main.scss",
  "shared/types.ts",
]);

const resolver = new ModuleResolver(UNITS, { aliases: { "#shared": "shared" }, srcDir: "." });

describe("ModuleResolver", () => {
  it("resolves relative paths with extension candidates", () => {
    expect(resolver.resolve("app.vue", "./components/Card.vue")).toEqual({ kind: "unit", path: "components/Card.vue" });
    expect(resolver.resolve("components/Card.vue", "../utils/format")).toEqual({ kind: "unit", path: "utils/format.ts" });
  });

  it("maps .js specifiers to TypeScript sources", () => {
    expect(resolver.resolve("app.vue", "./utils/format.js")).toEqual({ kind: "unit", path: "utils/format.ts" });
  });

  it("resolves directory index files", () => {
    expect(resolver.resolve("app.vue", "./components")).toEqual({ kind: "unit", path: "components/index.ts" });
  });

  it("resolves the default aliases", () => {
    expect(resolver.resolve("app.vue", "~/composables/useUser")).toEqual({ kind: "unit", path: "composables/useUser.ts" });
    expect(resolver.resolve("app.vue", "@/utils/format")).toEqual({ kind: "unit", path: "utils/format.ts" });
    expect(resolver.resolve("app.vue", "~~/utils/format")).toEqual({ kind: "unit", path: "utils/format.ts" });
  });

  it("resolves configured aliases", () => {
    expect(resolver.resolve("app.vue", "#shared/types")).toEqual({ kind: "unit", path: "shared/types.ts" });
  });

  it("treats framework virtual modules as virtual", () => {
    expect(resolver.resolve("app.vue", "#imports")).toEqual({ kind: "virtual" });
    expect(resolver.resolve("app.vue", "virtual:pwa-register")).toEqual({ kind: "virtual" });
  });

  it("classifies packages and builtins", () => {
    expect(resolver.resolve("app.vue", "@vueuse/core/index")).toEqual({ kind: "package", name: "@vueuse/core" });
    expect(resolver.resolve("app.vue", "lodash-es")).toEqual({ kind: "package", name: "lodash-es" });
    expect(resolver.resolve("app.vue", "node:path")).toEqual({ kind: "builtin" });
    expect(resolver.resolve("app.vue", "fs")).toEqual({ kind: "builtin" });
  });

  it("treats asset paths as assets and missing files as unresolved", () => {
    expect(resolver.resolve("app.vue", "./assets/logo.svg")).toEqual({ kind: "asset" });
    expect(resolver.resolve("app.vue", "./components/Missing.vue")).toEqual({ kind: "unresolved" });
    expect(resolver.resolve("app.vue", "../outside")).toEqual({ kind: "unresolved" });
  });

  it("finds SCSS partials and stylesheet-relative bare paths", () => {
    expect(resolver.resolve("assets/styles/main.scss", "vars", "css-import")).toEqual({ kind: "unit", path: "assets/styles/_vars.scss" });
    expect(resolver.resolve("assets/styles/main.scss", "~bootstrap/scss/grid", "css-import")).toEqual({ kind: "package", name: "bootstrap" });
  });

  it("drops query strings", () => {
    expect(resolver.resolve("app.vue", "./components/Card.vue?raw")).toEqual({ kind: "unit", path: "components/Card.vue" });
  });
});

describe("packageName", () => {
  it("keeps the scope of scoped packages", () => {
    expect(packageName("@nuxt/kit/dist")).toBe("@nuxt/kit");
    expect(packageName("vue/server-renderer")).toBe("vue");
  });
});

describe("defaultAliases", () => {
  it("points ~ and @ at the source directory and ~~ and @@ at the root", () => {
    expect(defaultAliases("app")).toEqual({ "~": "app", "@": "app", "~~": ".", "@@": "." });
  });
});
