import { describe, it, expect } from "vitest";
import { getAllRules, getRulesForMode, getRule } from "../registry.js";
import { CategorySchema, SeveritySchema } from "../../schemas.js";

describe("getAllRules", () => {
  it("every rule has valid fields", () => {
    for (const rule of getAllRules()) {
      expect(rule.id).toMatch(/^(clean|vuln|sys)-[a-z-]+$/);
      expect(rule.name).toBeTruthy();
      expect(rule.description).toBeTruthy();
      expect(CategorySchema.safeParse(rule.category).success).toBe(true);
      expect(SeveritySchema.safeParse(rule.severity).success).toBe(true);
    }
  });

  it("has no duplicate rule IDs", () => {
    const ids = getAllRules().map((r) => r.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it("covers every finding category", () => {
    const categories = new Set(getAllRules().map((r) => r.category));
    expect([...categories].sort()).toEqual([...CategorySchema.options].sort());
  });
});

describe("getRulesForMode", () => {
  it("keeps vuln rules out of clean runs", () => {
    const ids = getRulesForMode("clean").map((r) => r.id);
    expect(ids).toContain("clean-unused-export");
    expect(ids).toContain("sys-parse-error");
    expect(ids).not.toContain("vuln-eval");
  });

  it("keeps dead-code rules out of vuln runs", () => {
    const ids = getRulesForMode("vuln").map((r) => r.id);
    expect(ids).toContain("vuln-raw-html");
    expect(ids).toContain("sys-parse-error");
    expect(ids).not.toContain("clean-unused-css-class");
  });
});

describe("getRule", () => {
  it("returns the rule by id", () => {
    expect(getRule("vuln-eval").severity).toBe("critical");
  });

  it("throws on an unknown id", () => {
    expect(() => getRule("clean-nope")).toThrow("Unknown rule 'clean-nope'");
  });
});
