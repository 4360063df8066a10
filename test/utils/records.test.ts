import { describe, it, expect } from "vitest";
import type { TableSpec } from "../../src/schemas/catalog.js";
import {
  MAX_FIELD_LENGTH,
  parseTable,
  rowToRecord,
  tableFormat,
} from "../../src/utils/records.js";
import type { TableContext } from "../../src/utils/records.js";

const spec: TableSpec = {
  id_column: "term",
  search_columns: ["term", "description", "keywords"],
  output_columns: ["term", "description", "keywords"],
  list_columns: ["keywords"],
};

const ctx: TableContext = {
  kind: "domain",
  table: "style",
  origin: "external:domains/style.csv",
  defaultBoost: 0.1,
  file: "domains/style.csv",
};

describe("rowToRecord", () => {
  it("builds a record from the id column and splits list columns", () => {
    const result = rowToRecord(
      { Term: "Soft UI", description: "Gentle shadows", keywords: "soft, shadow" },
      spec,
      { ...ctx, row: 1 },
    );
    expect(result).toEqual({
      ok: true,
      warnings: [],
      record: {
        id: "Soft UI",
        domain: "style",
        kind: "domain",
        search_fields: ["Soft UI", "Gentle shadows", "soft, shadow"],
        output_fields: { term: "Soft UI", description: "Gentle shadows", keywords: ["soft", "shadow"] },
        origin: "external:domains/style.csv",
        priority_boost: 0.1,
      },
    });
  });

  it("prefers an explicit id column", () => {
    const result = rowToRecord({ id: "soft-ui", term: "Soft UI" }, spec, { ...ctx, row: 1 });
    expect(result.ok && result.record.id).toBe("soft-ui");
  });

  it("rejects a row without an id", () => {
    const result = rowToRecord({ description: "orphan" }, spec, { ...ctx, row: 4 });
    expect(result).toEqual({
      ok: false,
      error: {
        file: "domains/style.csv",
        row: 4,
        field: "term",
        message: "Skipping row: missing id ('id' or 'term')",
        severity: "error",
      },
    });
  });

  it("parses priority_boost and falls back on garbage", () => {
    const good = rowToRecord({ term: "A", priority_boost: "2.5" }, spec, { ...ctx, row: 1 });
    expect(good.ok && good.record.priority_boost).toBe(2.5);

    const bad = rowToRecord({ term: "B", priority_boost: "lots" }, spec, { ...ctx, row: 2 });
    expect(bad.ok && bad.record.priority_boost).toBe(0.1);
    expect(bad.ok && bad.warnings.map((w) => w.message)).toEqual([
      'Invalid priority_boost "lots", using default: 0.1',
    ]);
  });

  it("truncates very long values", () => {
    const result = rowToRecord({ term: "Long", description: "x".repeat(MAX_FIELD_LENGTH + 5) }, spec, {
      ...ctx,
      row: 1,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.output_fields.description).toBe(`${"x".repeat(MAX_FIELD_LENGTH)}...`);
    expect(result.warnings).toEqual([
      {
        file: "domains/style.csv",
        row: 1,
        field: "description",
        message: "Truncated long value in column 'description'",
        severity: "warning",
      },
    ]);
  });

  it("keeps JSON arrays in list columns", () => {
    const result = rowToRecord({ term: "A", keywords: [" one ", "", "two"] }, spec, { ...ctx, row: 1 });
    expect(result.ok && result.record.output_fields.keywords).toEqual(["one", "two"]);
    expect(result.ok && result.record.search_fields).toEqual(["A", "one , , two"]);
  });
});

describe("parseTable", () => {
  it("skips blank, overlong and duplicate rows with issues", () => {
    const csv = [
      "term,description,keywords",
      "Soft UI,Gentle,soft",
      ",,",
      "Extra,cells,x,surprise",
      "Soft UI,Again,dup",
      "Bold,Loud,",
    ].join("\n");
    const { records, issues } = parseTable(csv, "csv", spec, ctx);
    expect(records.map((r) => r.id)).toEqual(["Soft UI", "Bold"]);
    expect(issues).toEqual([
      {
        file: "domains/style.csv",
        row: 3,
        message: "Row has 4 cells but the header has 3; row skipped",
        severity: "error",
      },
      {
        file: "domains/style.csv",
        row: 4,
        message: 'Duplicate id "Soft UI"; row skipped',
        severity: "error",
      },
    ]);
  });

  it("warns about missing search columns", () => {
    const { issues } = parseTable("term\nSolo\n", "csv", spec, ctx);
    expect(issues).toEqual([
      { file: "domains/style.csv", message: "Missing search columns: description, keywords", severity: "warning" },
    ]);
  });

  it("keeps stray quotes as text and skips only a row whose quote never closes", () => {
    const text = 'term,description,keywords\nPhone,Fits a 5" screen,mobile\nTablet,"Large\nDesk,Wide grid,desk\n';
    const { records, issues } = parseTable(text, "csv", spec, ctx);
    expect(records.map((r) => r.id)).toEqual(["Phone", "Desk"]);
    expect(records[0].search_fields).toEqual(["Phone", 'Fits a 5" screen', "mobile"]);
    expect(issues).toEqual([
      { file: "domains/style.csv", row: 2, message: "Unterminated quoted field; row skipped", severity: "error" },
    ]);
  });

  it("reads JSON arrays and records objects", () => {
    const asArray = parseTable('[{"term": "A"}, 3]', "json", spec, ctx);
    expect(asArray.records.map((r) => r.id)).toEqual(["A"]);
    expect(asArray.issues).toEqual([
      { file: "domains/style.csv", row: 2, message: "Row is not an object; skipped", severity: "error" },
    ]);

    const asObject = parseTable('{"records": [{"term": "B"}]}', "json", spec, ctx);
    expect(asObject.records.map((r) => r.id)).toEqual(["B"]);
  });

  it("reports malformed JSON", () => {
    const { records, issues } = parseTable("{nope", "json", spec, ctx);
    expect(records).toEqual([]);
    expect(issues).toHaveLength(1);
    expect(issues[0].message.startsWith("Malformed JSON:")).toBe(true);
  });
});

describe("tableFormat", () => {
  it("maps extensions case-insensitively", () => {
    expect(tableFormat("style.CSV")).toBe("csv");
    expect(tableFormat("rules.json")).toBe("json");
    expect(tableFormat("notes.txt")).toBeNull();
  });
});
