import { describe, it, expect } from "vitest";
import { matchesGlob, matchesAny, staticPrefix, normalizePath } from "../glob.js";

describe("matchesGlob", () => {
  it("matches bare directory names at any depth", () => {
    expect(matchesGlob("src/vendor/lib.js", "vendor")).toBe(true);
    expect(matchesGlob("src/vendors/lib.js", "vendor")).toBe(false);
  });

  it("matches path prefixes", () => {
    expect(matchesGlob("public/vendor/a.js", "public/vendor/")).toBe(true);
    expect(matchesGlob("public/vendor.js", "public/vendor/")).toBe(false);
  });

  it("treats ** as any number of segments", () => {
    expect(matchesGlob("pages/index.vue", "pages/**")).toBe(true);
    expect(matchesGlob("pages/blog/[slug].vue", "pages/**")).toBe(true);
    expect(matchesGlob("src/pages/index.vue", "pages/**", true)).toBe(false);
  });

  it("keeps * inside one segment", () => {
    expect(matchesGlob("nuxt.config.ts", "nuxt.config.*", true)).toBe(true);
    expect(matchesGlob("config/nuxt.config.ts", "nuxt.config.*", true)).toBe(false);
  });

  it("matches slash-free patterns against the basename when unanchored", () => {
    expect(matchesGlob("assets/js/app.min.js", "*.min.js")).toBe(true);
    expect(matchesGlob("assets/js/app.min.js", "*.min.js", true)).toBe(false);
  });

  it("matchesAny is true when one pattern matches", () => {
    expect(matchesAny("server/api/a.ts", ["pages/**", "server/**"], true)).toBe(true);
    expect(matchesAny("lib/a.ts", ["pages/**", "server/**"], true)).toBe(false);
  });
});

describe("staticPrefix", () => {
  it("stops at the first wildcard segment", () => {
    expect(staticPrefix("app/pages/**")).toBe("app/pages");
    expect(staticPrefix("nuxt.config.*")).toBe("");
    expect(staticPrefix("src/main.ts")).toBe("src/main.ts");
  });
});

describe("normalizePath", () => {
  it("uses forward slashes and drops a leading ./", () => {
    expect(normalizePath(".\\src\\a.ts")).toBe("src/a.ts");
    expect(normalizePath("./src/a.ts")).toBe("src/a.ts");
  });
});
