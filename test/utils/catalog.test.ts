import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  buildCatalog,
  catalogKeywords,
  getBuiltinDataDir,
  loadCatalog,
  tableSpecFor,
} from "../../src/utils/catalog.js";
import { loadBuiltinStore } from "../../src/utils/knowledge-base.js";
import { InvalidCatalogError } from "../../src/utils/errors.js";

const minimal = {
  version: "1",
  default_domain: "style",
  max_results: 3,
  domains: {
    style: {
      file: "styles.csv",
      id_column: "Name",
      search_columns: ["Name", "Keywords"],
      output_columns: ["Name", "Keywords"],
      list_columns: ["Keywords"],
      keywords: ["style"],
    },
  },
  stack_columns: {
    id_column: "Guideline",
    search_columns: ["Guideline"],
    output_columns: ["Guideline"],
    list_columns: [],
  },
  stacks: { react: { file: "stacks/react.csv" } },
  custom_domain: {
    id_column: "term",
    search_columns: ["term"],
    output_columns: ["term"],
    list_columns: [],
  },
};

describe("built-in catalog", () => {
  it("loads and lists domains in router order", async () => {
    const catalog = await loadCatalog();
    expect(Object.keys(catalog.domains)).toEqual([
      "style",
      "color",
      "typography",
      "chart",
      "landing",
      "product",
      "ux",
    ]);
    expect(catalog.default_domain).toBe("style");
    expect(catalog.max_results).toBe(3);
    expect(Object.keys(catalog.stacks)).toEqual(["html-tailwind", "react", "vue", "flutter"]);
    expect(catalog.stacks.react.file).toBe("stacks/react.csv");
    expect(catalog.stacks.react.id_column).toBe("Guideline");
  });

  it("loads every built-in table without issues", async () => {
    const dataDir = getBuiltinDataDir();
    const catalog = await loadCatalog(dataDir);
    const kb = await loadBuiltinStore(catalog, dataDir);

    expect(kb.issues).toEqual([]);
    expect(kb.files).toHaveLength(11);
    expect(kb.store.names("domain")).toEqual(["chart", "color", "landing", "product", "style", "typography", "ux"]);
    expect(kb.store.records({ kind: "domain", name: "style" })).toHaveLength(7);
    expect(kb.store.records({ kind: "stack", name: "vue" })).toHaveLength(3);

    const saas = kb.store.records({ kind: "domain", name: "product" })[0];
    expect(saas.id).toBe("SaaS Dashboard");
    expect(saas.output_fields.Keywords).toEqual(["dashboard", "analytics", "admin panel", "metrics"]);
    expect(saas.origin).toBe("builtin");
  });
});

describe("buildCatalog", () => {
  it("expands the shared stack layout", () => {
    const catalog = buildCatalog(minimal);
    expect(catalog.stacks.react).toEqual({ ...minimal.stack_columns, file: "stacks/react.csv" });
    expect(catalog.custom_stack).toEqual(minimal.stack_columns);
  });

  it("rejects a default domain that is not declared", () => {
    expect(() => buildCatalog({ ...minimal, default_domain: "motion" }, "catalog.yaml")).toThrow(
      'Invalid catalog catalog.yaml: default_domain "motion" is not a declared domain',
    );
  });

  it("rejects a malformed catalog", () => {
    expect(() => buildCatalog({ version: "1" })).toThrow(InvalidCatalogError);
  });

  it("falls back to the custom layouts for unknown tables", () => {
    const catalog = buildCatalog(minimal);
    expect(tableSpecFor(catalog, { kind: "domain", name: "style" }).id_column).toBe("Name");
    expect(tableSpecFor(catalog, { kind: "domain", name: "motion" }).id_column).toBe("term");
    expect(tableSpecFor(catalog, { kind: "domain", name: "toString" }).id_column).toBe("term");
    expect(tableSpecFor(catalog, { kind: "stack", name: "svelte" }).id_column).toBe("Guideline");
  });

  it("exposes router keywords per domain", () => {
    expect(catalogKeywords(buildCatalog(minimal))).toEqual(new Map([["style", ["style"]]]));
  });
});

describe("loadBuiltinStore", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "swatchbook-kb-test-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("skips tables whose file is missing", async () => {
    await writeFile(join(tmpDir, "styles.csv"), "Name,Keywords\nMinimal,\"clean, calm\"\n", "utf-8");
    const kb = await loadBuiltinStore(buildCatalog(minimal), tmpDir);
    expect(kb.files).toEqual(["styles.csv"]);
    expect(kb.store.records({ kind: "domain", name: "style" }).map((r) => r.id)).toEqual(["Minimal"]);
    expect(kb.store.has({ kind: "stack", name: "react" })).toBe(false);
  });

  it("reports bad rows and keeps the rest", async () => {
    await mkdir(join(tmpDir, "stacks"));
    await writeFile(join(tmpDir, "styles.csv"), "Name,Keywords\n,orphan\nBold,loud\n", "utf-8");
    await writeFile(join(tmpDir, "stacks", "react.csv"), "Guideline\nUse keys\n", "utf-8");
    const kb = await loadBuiltinStore(buildCatalog(minimal), tmpDir);
    expect(kb.store.records({ kind: "domain", name: "style" }).map((r) => r.id)).toEqual(["Bold"]);
    expect(kb.store.records({ kind: "stack", name: "react" }).map((r) => r.id)).toEqual(["Use keys"]);
    expect(kb.issues.map((i) => [i.file, i.row, i.severity])).toEqual([["styles.csv", 1, "error"]]);
  });
});
