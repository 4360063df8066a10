import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { Catalog, TableSpec } from "../schemas/catalog.js";
import type { GuidelineRecord, TableKind, ValidationIssue } from "../schemas/record.js";
import { isNotFound } from "./errors.js";
import type { Logger } from "./logger.js";
import { SilentLogger } from "./logger.js";
import { parseTable, tableFormat } from "./records.js";
import { RecordStore } from "./store.js";

export interface BuiltinKnowledgeBase {
  store: RecordStore;
  /** Table files that were read, relative to the data directory. */
  files: string[];
  issues: ValidationIssue[];
}

/**
 * Read every table the catalog lists. A missing table file is skipped;
 * the remaining tables still load.
 */
export async function loadBuiltinStore(
  catalog: Catalog,
  dataDir: string,
  logger: Logger = new SilentLogger(),
): Promise<BuiltinKnowledgeBase> {
  const records: GuidelineRecord[] = [];
  const files: string[] = [];
  const issues: ValidationIssue[] = [];

  const tables: [TableKind, string, TableSpec][] = [
    ...Object.entries(catalog.domains).map(([name, spec]): [TableKind, string, TableSpec] => ["domain", name, spec]),
    ...Object.entries(catalog.stacks).map(([name, spec]): [TableKind, string, TableSpec] => ["stack", name, spec]),
  ];

  for (const [kind, name, spec] of tables) {
    if (!spec.file) continue;
    const format = tableFormat(spec.file);
    if (!format) {
      logger.warn(`Skipping built-in ${kind} "${name}": unsupported file ${spec.file}`);
      continue;
    }

    let text: string;
    try {
      text = await readFile(join(dataDir, spec.file), "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        logger.debug(`Built-in ${kind} "${name}" has no data file (${spec.file})`);
        continue;
      }
      throw err;
    }

    const parsed = parseTable(text, format, spec, {
      kind,
      table: name,
      origin: "builtin",
      defaultBoost: 0,
      file: spec.file,
    });
    for (const issue of parsed.issues) {
      logger.debug(`${issue.file}${issue.row !== undefined ? `:${issue.row}` : ""} ${issue.message}`);
    }
    records.push(...parsed.records);
    issues.push(...parsed.issues);
    files.push(spec.file);
  }

  return { store: RecordStore.fromRecords(records), files, issues };
}
