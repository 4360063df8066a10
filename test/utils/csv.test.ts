import { describe, it, expect } from "vitest";
import { isBlankRow, parseCsv, splitList } from "../../src/utils/csv.js";

describe("parseCsv", () => {
  it("reads a header and numbered rows", () => {
    const table = parseCsv("name,keywords\nGlass,blur\nFlat,simple\n");
    expect(table.header).toEqual(["name", "keywords"]);
    expect(table.rows).toEqual([
      { row: 1, cells: ["Glass", "blur"] },
      { row: 2, cells: ["Flat", "simple"] },
    ]);
    expect(table.errors).toEqual([]);
  });

  it("handles quoted commas, doubled quotes and line breaks", () => {
    const table = parseCsv('id,notes\nx,"a, b"\ny,"say ""hi"""\nz,"two\nlines"');
    expect(table.rows.map((r) => r.cells[1])).toEqual(["a, b", 'say "hi"', "two\nlines"]);
  });

  it("accepts a BOM and CRLF line endings", () => {
    const table = parseCsv("\uFEFFid ,value\r\n1,one\r\n");
    expect(table.header).toEqual(["id", "value"]);
    expect(table.rows).toEqual([{ row: 1, cells: ["1", "one"] }]);
  });

  it("reports an unterminated quote and keeps earlier rows", () => {
    const table = parseCsv('id,notes\nok,fine\nbad,"never closed\n');
    expect(table.rows).toEqual([{ row: 1, cells: ["ok", "fine"] }]);
    expect(table.errors).toEqual([{ row: 2, message: "Unterminated quoted field; row skipped" }]);
  });

  it("resumes on the line after an unterminated quote", () => {
    const table = parseCsv('id,notes\nbad,"open\nnext,row\nlast,one\n');
    expect(table.rows).toEqual([
      { row: 2, cells: ["next", "row"] },
      { row: 3, cells: ["last", "one"] },
    ]);
    expect(table.errors).toEqual([{ row: 1, message: "Unterminated quoted field; row skipped" }]);
  });

  it("treats a quote inside an unquoted field as text", () => {
    const table = parseCsv('id,notes\nphone,Fits a 5" screen\ntablet,Large layout\n');
    expect(table.rows).toEqual([
      { row: 1, cells: ["phone", 'Fits a 5" screen'] },
      { row: 2, cells: ["tablet", "Large layout"] },
    ]);
    expect(table.errors).toEqual([]);
  });

  it("returns an empty table for empty input", () => {
    expect(parseCsv("")).toEqual({ header: [], rows: [], errors: [] });
  });
});

describe("isBlankRow", () => {
  it("is true only when every cell is whitespace", () => {
    expect(isBlankRow(["", "  "])).toBe(true);
    expect(isBlankRow([""])).toBe(true);
    expect(isBlankRow(["", "x"])).toBe(false);
  });
});

describe("splitList", () => {
  it("trims items and drops empty ones", () => {
    expect(splitList(" clean, simple ,, whitespace ")).toEqual(["clean", "simple", "whitespace"]);
  });
});
