import { describe, it, expect } from "vitest";
import { parseUnit } from "../../parsers/index.js";
import { extractUnit } from "../../extract/index.js";
import { ModuleResolver } from "../module-resolver.js";
import { UsageGraph, buildUsageGraph, type BuildResult } from "../usage-graph.js";
import { computeReachable } from "../reachability.js";
import { livenessOf, reportDeadCode, reportUnreachableModules } from "../../report/dead-code.js";
import { sortFindings } from "../../report/findings.js";
import type { Finding } from "../../schemas.js";

interface Analysis extends BuildResult {
  dead: Finding[];
}

function analyse(files: Record<string, string>, entryUnits: string[] = []): Analysis {
  const extractions = Object.entries(files).map(([path, text]) =>
    extractUnit(parseUnit(path, text), { reportBlockScoped: false, reportConsole: false }),
  );
  const resolver = new ModuleResolver(new Set(Object.keys(files)), { aliases: {}, srcDir: "." });
  const result = buildUsageGraph({ extractions, resolver, entryUnits, packages: [] });
  const dead = reportDeadCode({ graph: result.graph, texts: new Map(Object.entries(files)) });
  return { ...result, dead };
}

function summary(findings: readonly Finding[]): string[] {
  return findings.map((f) => `${f.category} ${f.filePath} ${f.symbol ?? ""} ${f.severity}`).sort();
}

describe("dead code", () => {
  const LIB = "export const used = 1;\nexport const unused = 2;\nconst internal = 3;\nexport default function main() {}\n";
  const APP = 'import { used } from "./lib";\nimport main from "./lib";\nexport const total = used + 1;\n';

  it("reports exactly the symbols nothing statically reaches", () => {
    const { dead } = analyse({ "lib.ts": LIB, "app.ts": APP });
    expect(summary(dead)).toEqual([
      "UnusedExport app.ts total unused",
      "UnusedExport lib.ts unused unused",
      "UnusedImport app.ts main unused",
      "UnusedVariable lib.ts internal unused",
    ]);
  });

  it("keeps the exports of entry units alive", () => {
    const { dead } = analyse({ "lib.ts": LIB, "app.ts": APP }, ["app.ts"]);
    expect(summary(dead)).not.toContain("UnusedExport app.ts total unused");
    expect(dead).toHaveLength(3);
  });

  it("attaches the declaration line as a snippet", () => {
    const { dead } = analyse({ "lib.ts": LIB, "app.ts": APP });
    const internal = dead.find((f) => f.symbol === "internal");
    expect(internal).toMatchObject({ startLine: 3, codeSnippet: "const internal = 3;", description: "'internal' is declared but never used" });
  });

  it("follows re-exports and star re-exports, but not for default", () => {
    const result = analyse(
      {
        "a.ts": "export const x = 1;\nexport const y = 2;\nexport default 3;\n",
        "barrel.ts": 'export * from "./a";\nexport { y as why } from "./a";\n',
        "main.ts": 'import { x, why } from "./barrel";\nimport def from "./barrel";\nexport const v = [x, why, def];\n',
      },
      ["main.ts"],
    );
    expect(summary(result.dead)).toEqual(["UnusedExport a.ts default unused"]);
    expect(result.findings.map((f) => [f.category, f.filePath, f.description])).toEqual([
      ["UnresolvedImport", "main.ts", "'default' is not exported by 'barrel.ts'"],
    ]);
  });

  it("marks exports of dynamically imported modules as possibly unused", () => {
    const { dead } = analyse(
      {
        "lazy.ts": "export default function Page() {}\nexport const helper = 1;\n",
        "main.ts": 'export const load = () => import("./lazy");\n',
      },
      ["main.ts"],
    );
    expect(summary(dead)).toEqual(["UnusedExport lazy.ts helper possibly-unused"]);
    expect(dead[0]?.description).toBe("'helper' is only referenced dynamically (verify manually)");
  });

  it("links namespace member reads to the export they name", () => {
    const api = "export function getUser() {}\nexport function saveUser() {}\n";
    const member = analyse(
      { "api.ts": api, "main.ts": 'import * as api from "./api";\nexport const run = () => api.getUser();\n' },
      ["main.ts"],
    );
    expect(summary(member.dead)).toEqual(["UnusedExport api.ts saveUser unused"]);

    const whole = analyse({ "api.ts": api, "main.ts": 'import * as api from "./api";\nexport const all = api;\n' }, ["main.ts"]);
    expect(summary(whole.dead)).toEqual([
      "UnusedExport api.ts getUser possibly-unused",
      "UnusedExport api.ts saveUser possibly-unused",
    ]);
  });

  it("matches scoped classes only inside their component", () => {
    const { dead } = analyse(
      {
        "components/A.vue":
          '<template><div class="card used-global" /></template>\n<style scoped>\n.card { color: red; }\n.spare { color: blue; }\n</style>\n',
        "components/B.vue": '<template><div class="spare" /></template>\n',
        "assets/main.css": ".used-global { margin: 0; }\n.orphan { margin: 0; }\n",
      },
      ["components/A.vue", "components/B.vue"],
    );
    expect(summary(dead)).toEqual([
      "UnusedCssClass assets/main.css orphan unused",
      "UnusedCssClass components/A.vue spare unused",
    ]);
  });

  it("treats prefix-matched classes as possibly unused and ternary branches as used", () => {
    const { dead } = analyse(
      {
        "components/Btn.vue": [
          "<template>",
          "  <button :class=\"`btn-${size}`\" />",
          "  <span :class=\"on ? 'is-on' : 'is-off'\" />",
          "</template>",
          "<script setup>",
          'const size = "lg";',
          "const on = true;",
          "</script>",
          "<style scoped>",
          ".btn-lg { padding: 1px; }",
          ".other { padding: 0; }",
          ".is-on { color: green; }",
          ".is-off { color: grey; }",
          "</style>",
          "",
        ].join("\n"),
      },
      ["components/Btn.vue"],
    );
    expect(summary(dead)).toEqual([
      "UnusedCssClass components/Btn.vue btn-lg possibly-unused",
      "UnusedCssClass components/Btn.vue other unused",
    ]);
  });

  it("never reports a class as unused when an identifier binding could produce it", () => {
    const { dead } = analyse(
      {
        "components/Tag.vue":
          '<template><div :class="cls" /></template>\n<script setup>\nconst cls = pick();\n</script>\n<style scoped>\n.lonely { color: red; }\n</style>\n',
      },
      ["components/Tag.vue"],
    );
    expect(summary(dead)).toEqual(["UnusedCssClass components/Tag.vue lonely possibly-unused"]);
    expect(dead[0]?.description).toBe("Class '.lonely' is only matched by a dynamic class expression (verify manually)");
  });

  it("keeps dynamic class expressions to the classes of their own unit", () => {
    const { dead } = analyse(
      {
        "pages/other.vue":
          '<template><div :class="someVar" /></template>\n<script setup>\nconst someVar = pick();\n</script>\n<style>\n.local { color: red; }\n</style>\n',
        "assets/site.css": ".neverUsed { color: red; }\n",
      },
      ["pages/other.vue"],
    );
    expect(summary(dead)).toEqual([
      "UnusedCssClass assets/site.css neverUsed unused",
      "UnusedCssClass pages/other.vue local possibly-unused",
    ]);
  });

  it("does not let v-for aliases keep same-named script bindings alive", () => {
    const { dead } = analyse(
      {
        "components/List.vue":
          '<template><li v-for="item in list">{{ item }}</li></template>\n<script setup>\nconst list = [];\nconst item = 5;\n</script>\n',
      },
      ["components/List.vue"],
    );
    expect(summary(dead)).toEqual(["UnusedVariable components/List.vue item unused"]);
  });

  it("reports unresolved relative imports", () => {
    const { findings } = analyse({ "a.ts": 'import { a } from "./missing";\nexport const b = a;\n' });
    expect(findings.map((f) => [f.ruleId, f.startLine, f.description])).toEqual([
      ["sys-unresolved-import", 1, "Cannot resolve module './missing'"],
    ]);
  });

  it("produces the same findings on every run", () => {
    const files = { "lib.ts": LIB, "app.ts": APP };
    expect(sortFindings(analyse(files).dead)).toEqual(sortFindings(analyse(files).dead));
  });
});

describe("livenessOf", () => {
  it("distinguishes static, dynamic-only and missing incoming edges", () => {
    const graph = new UsageGraph();
    graph.addEdge("a", "b", "dynamic");
    expect(livenessOf(graph, "b")).toBe("possibly-unused");
    graph.addEdge("c", "b", "static");
    graph.addEdge("c", "b", "static");
    expect(graph.incoming("b")).toEqual({ static: 1, dynamic: 1 });
    expect(livenessOf(graph, "b")).toBe("live");
    expect(livenessOf(graph, "missing")).toBe("unused");
  });
});

describe("reachability", () => {
  const FILES = {
    "main.ts": 'import { fmt } from "./util";\nexport const out = fmt;\n',
    "util.ts": "export const fmt = 1;\n",
    "orphan.ts": "export const lost = 1;\n",
    "theme.css": ".x { color: red; }\n",
  };
  const UNITS = [
    { path: "main.ts", dialect: "module-script" as const },
    { path: "util.ts", dialect: "module-script" as const },
    { path: "orphan.ts", dialect: "module-script" as const },
    { path: "theme.css", dialect: "stylesheet" as const },
  ];

  it("walks every edge from the entry nodes", () => {
    const { graph } = analyse(FILES, ["main.ts"]);
    const reachable = computeReachable(graph);
    expect(reachable.has("unit:util.ts")).toBe(true);
    expect(reachable.has("util.ts#export:fmt")).toBe(true);
    expect(reachable.has("unit:orphan.ts")).toBe(false);
  });

  it("reports unreached script units but never stylesheets", () => {
    const { graph } = analyse(FILES, ["main.ts"]);
    const findings = reportUnreachableModules({ units: UNITS, reachable: computeReachable(graph), hasEntries: true });
    expect(findings.map((f) => [f.category, f.filePath, f.severity])).toEqual([["UnreachableModule", "orphan.ts", "info"]]);
  });

  it("reports nothing when there are no entry points", () => {
    const { graph } = analyse(FILES);
    expect(reportUnreachableModules({ units: UNITS, reachable: computeReachable(graph), hasEntries: false })).toEqual([]);
  });
});
