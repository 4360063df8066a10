import type { TableSpec } from "../schemas/catalog.js";
import type {
  FieldValue,
  GuidelineRecord,
  RecordOrigin,
  TableKind,
  ValidationIssue,
} from "../schemas/record.js";
import { isBlankRow, parseCsv, splitList } from "./csv.js";
import { errorMessage } from "./errors.js";

export const MAX_FIELD_LENGTH = 1000;

/** Reserved columns that are never display fields. */
const ID_COLUMN = "id";
const BOOST_COLUMN = "priority_boost";

export interface RowContext {
  kind: TableKind;
  table: string;
  origin: RecordOrigin;
  /** Boost used when the row has no valid `priority_boost` cell. */
  defaultBoost: number;
  /** File name used in issues. */
  file: string;
  row: number;
}

export type RowResult =
  | { ok: true; record: GuidelineRecord; warnings: ValidationIssue[] }
  | { ok: false; error: ValidationIssue };

/**
 * Turn one parsed row (column name → cell) into a record. Column names are
 * matched case-insensitively against the table layout.
 */
export function rowToRecord(
  row: Record<string, unknown>,
  spec: TableSpec,
  ctx: RowContext,
): RowResult {
  const warnings: ValidationIssue[] = [];
  const cells = new Map<string, unknown>();
  for (const [column, value] of Object.entries(row)) {
    cells.set(column.trim().toLowerCase(), value);
  }
  const listColumns = new Set(spec.list_columns.map((c) => c.toLowerCase()));

  const issue = (message: string, severity: ValidationIssue["severity"], field?: string): ValidationIssue => ({
    file: ctx.file,
    row: ctx.row,
    ...(field ? { field } : {}),
    message,
    severity,
  });

  const texts = new Map<string, string | undefined>();
  const readText = (column: string): string | undefined => {
    const key = column.toLowerCase();
    if (texts.has(key)) return texts.get(key);
    const text = cellText(column, cells.get(key));
    texts.set(key, text);
    return text;
  };

  const cellText = (column: string, value: unknown): string | undefined => {
    if (value === undefined || value === null) return undefined;
    let text: string;
    if (typeof value === "string") {
      text = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      text = String(value);
    } else if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
      text = value.join(", ");
    } else {
      warnings.push(issue(`Unsupported value in column '${column}'; ignored`, "warning", column));
      return undefined;
    }
    text = text.trim();
    if (text.length > MAX_FIELD_LENGTH) {
      warnings.push(issue(`Truncated long value in column '${column}'`, "warning", column));
      text = `${text.slice(0, MAX_FIELD_LENGTH)}...`;
    }
    return text;
  };

  const id = readText(ID_COLUMN) || readText(spec.id_column);
  if (!id) {
    return {
      ok: false,
      error: issue(`Skipping row: missing id ('${ID_COLUMN}' or '${spec.id_column}')`, "error", spec.id_column),
    };
  }

  const searchFields: string[] = [];
  for (const column of spec.search_columns) {
    const text = readText(column);
    if (text) searchFields.push(text);
  }
  if (searchFields.length === 0) {
    return {
      ok: false,
      error: issue(
        `Skipping row "${id}": no searchable text in ${spec.search_columns.join(", ")}`,
        "error",
      ),
    };
  }

  const outputFields: Record<string, FieldValue> = {};
  for (const column of spec.output_columns) {
    const key = column.toLowerCase();
    const raw = cells.get(key);
    if (listColumns.has(key) && Array.isArray(raw)) {
      const items = raw.filter((item): item is string => typeof item === "string").map((item) => item.trim());
      outputFields[column] = items.filter((item) => item.length > 0);
      continue;
    }
    const text = readText(column);
    if (text === undefined || text.length === 0) continue;
    outputFields[column] = listColumns.has(key) ? splitList(text) : text;
  }

  let boost = ctx.defaultBoost;
  const boostText = readText(BOOST_COLUMN);
  if (boostText) {
    const parsed = Number(boostText);
    if (Number.isFinite(parsed)) {
      boost = parsed;
    } else {
      warnings.push(
        issue(`Invalid ${BOOST_COLUMN} "${boostText}", using default: ${ctx.defaultBoost}`, "warning", BOOST_COLUMN),
      );
    }
  }

  return {
    ok: true,
    record: {
      id,
      domain: ctx.table,
      kind: ctx.kind,
      search_fields: searchFields,
      output_fields: outputFields,
      origin: ctx.origin,
      priority_boost: boost,
    },
    warnings,
  };
}

/** Zip a header with a row of cells; missing trailing cells read as empty. */
export function cellsToRow(header: string[], cells: string[]): Record<string, string> {
  const row: Record<string, string> = {};
  header.forEach((column, index) => {
    if (column.length > 0) row[column] = cells[index] ?? "";
  });
  return row;
}

export type TableFormat = "csv" | "json";

export type TableContext = Omit<RowContext, "row">;

export interface ParsedTable {
  records: GuidelineRecord[];
  issues: ValidationIssue[];
}

export function tableFormat(fileName: string): TableFormat | null {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(".csv")) return "csv";
  if (lower.endsWith(".json")) return "json";
  return null;
}

/**
 * Parse one table file. Bad rows are reported and skipped; the rest of the
 * file still loads.
 */
export function parseTable(
  text: string,
  format: TableFormat,
  spec: TableSpec,
  ctx: TableContext,
): ParsedTable {
  const parsed = format === "csv" ? csvRows(text, spec, ctx.file) : jsonRows(text, ctx.file);
  const records: GuidelineRecord[] = [];
  const issues = parsed.issues;
  const seen = new Set<string>();

  for (const { row, values } of parsed.rows) {
    const result = rowToRecord(values, spec, { ...ctx, row });
    if (!result.ok) {
      issues.push(result.error);
      continue;
    }
    issues.push(...result.warnings);
    if (seen.has(result.record.id)) {
      issues.push({
        file: ctx.file,
        row,
        message: `Duplicate id "${result.record.id}"; row skipped`,
        severity: "error",
      });
      continue;
    }
    seen.add(result.record.id);
    records.push(result.record);
  }

  return { records, issues };
}

interface RawRows {
  rows: { row: number; values: Record<string, unknown> }[];
  issues: ValidationIssue[];
}

function csvRows(text: string, spec: TableSpec, file: string): RawRows {
  const table = parseCsv(text);
  const issues: ValidationIssue[] = [];
  for (const { row, message } of table.errors) {
    issues.push({ file, row, message, severity: "error" });
  }

  const present = new Set(table.header.map((column) => column.toLowerCase()));
  const missing = spec.search_columns.filter((column) => !present.has(column.toLowerCase()));
  if (missing.length > 0) {
    issues.push({ file, message: `Missing search columns: ${missing.join(", ")}`, severity: "warning" });
  }

  const rows: RawRows["rows"] = [];
  for (const { row, cells } of table.rows) {
    if (isBlankRow(cells)) continue;
    if (cells.length > table.header.length && !isBlankRow(cells.slice(table.header.length))) {
      issues.push({
        file,
        row,
        message: `Row has ${cells.length} cells but the header has ${table.header.length}; row skipped`,
        severity: "error",
      });
      continue;
    }
    rows.push({ row, values: cellsToRow(table.header, cells) });
  }
  return { rows, issues };
}

function jsonRows(text: string, file: string): RawRows {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return { rows: [], issues: [{ file, message: `Malformed JSON: ${errorMessage(err)}`, severity: "error" }] };
  }

  const list = Array.isArray(data) ? data : isObject(data) && Array.isArray(data.records) ? data.records : null;
  if (!list) {
    return {
      rows: [],
      issues: [{ file, message: "Expected an array of rows or an object with a records array", severity: "error" }],
    };
  }

  const rows: RawRows["rows"] = [];
  const issues: ValidationIssue[] = [];
  list.forEach((item: unknown, index: number) => {
    const row = index + 1;
    if (isObject(item)) {
      rows.push({ row, values: item });
    } else {
      issues.push({ file, row, message: "Row is not an object; skipped", severity: "error" });
    }
  });
  return { rows, issues };
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
