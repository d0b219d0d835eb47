import { describe, it, expect } from "vitest";
import { classifyFile, isDialect, isFrameworkConfig, SOURCE_EXTENSIONS } from "../file-classifier.js";

describe("classifyFile", () => {
  it("classifies .vue files as components", () => {
    expect(classifyFile("components/Card.vue")).toEqual({ dialect: "component" });
  });

  it("classifies script extensions with their language", () => {
    expect(classifyFile("src/index.ts")).toEqual({ dialect: "module-script", lang: "ts" });
    expect(classifyFile("src/App.tsx")).toEqual({ dialect: "module-script", lang: "tsx" });
    expect(classifyFile("lib/a.mjs")).toEqual({ dialect: "module-script", lang: "js" });
    expect(classifyFile("lib/a.cts")).toEqual({ dialect: "module-script", lang: "ts" });
    expect(classifyFile("lib/Button.jsx")).toEqual({ dialect: "module-script", lang: "jsx" });
  });

  it("classifies stylesheets", () => {
    expect(classifyFile("assets/main.css")).toEqual({ dialect: "stylesheet", lang: "css" });
    expect(classifyFile("assets/_vars.scss")).toEqual({ dialect: "stylesheet", lang: "scss" });
  });

  it("is case-insensitive on the extension", () => {
    expect(classifyFile("assets/MAIN.CSS")).toEqual({ dialect: "stylesheet", lang: "css" });
  });

  it("ignores declaration files", () => {
    expect(classifyFile("types/env.d.ts")).toBeNull();
    expect(classifyFile("types/shim.d.mts")).toBeNull();
  });

  it("returns null for everything else", () => {
    expect(classifyFile("README.md")).toBeNull();
    expect(classifyFile("assets/logo.svg")).toBeNull();
    expect(classifyFile("src/.env")).toBeNull();
    expect(classifyFile("Makefile")).toBeNull();
  });
});

describe("isDialect", () => {
  it("checks the dialect of a path", () => {
    expect(isDialect("a.vue", "component")).toBe(true);
    expect(isDialect("a.scss", "module-script")).toBe(false);
  });
});

describe("isFrameworkConfig", () => {
  it("recognises framework config units", () => {
    expect(isFrameworkConfig("nuxt.config.ts")).toBe(true);
    expect(isFrameworkConfig("apps/web/vite.config.mjs")).toBe(true);
    expect(isFrameworkConfig("app.config.ts")).toBe(true);
    expect(isFrameworkConfig("src/config.ts")).toBe(false);
    expect(isFrameworkConfig("nuxt.config.json")).toBe(false);
  });
});

describe("SOURCE_EXTENSIONS", () => {
  it("covers every classified extension", () => {
    expect([...SOURCE_EXTENSIONS].sort()).toEqual(
      [".cjs", ".css", ".cts", ".js", ".jsx", ".mjs", ".mts", ".scss", ".ts", ".tsx", ".vue"],
    );
  });
});
