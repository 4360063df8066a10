import { createHash } from "node:crypto";
import type { GuidelineRecord, TableKind, TableRef } from "../schemas/record.js";
import { tableKey } from "../schemas/record.js";

/**
 * Immutable snapshot of guideline records, grouped by table.
 * Merging or reloading produces a new store; nothing mutates one in place.
 */
export class RecordStore {
  private readonly tables: ReadonlyMap<string, readonly GuidelineRecord[]>;
  private readonly fingerprints = new Map<string, string>();

  private constructor(tables: Map<string, readonly GuidelineRecord[]>) {
    this.tables = tables;
  }

  static empty(): RecordStore {
    return new RecordStore(new Map());
  }

  /** Group records by `(kind, domain)`, preserving input order within each table. */
  static fromRecords(records: Iterable<GuidelineRecord>): RecordStore {
    const grouped = new Map<string, GuidelineRecord[]>();
    for (const record of records) {
      const key = tableKey({ kind: record.kind, name: record.domain });
      const list = grouped.get(key);
      const frozen = freezeRecord(record);
      if (list) {
        list.push(frozen);
      } else {
        grouped.set(key, [frozen]);
      }
    }
    const tables = new Map<string, readonly GuidelineRecord[]>();
    for (const [key, list] of grouped) {
      tables.set(key, Object.freeze(list));
    }
    return new RecordStore(tables);
  }

  records(ref: TableRef): readonly GuidelineRecord[] {
    return this.tables.get(tableKey(ref)) ?? [];
  }

  has(ref: TableRef): boolean {
    return this.records(ref).length > 0;
  }

  /** Table names of one kind, sorted. */
  names(kind: TableKind): string[] {
    const prefix = `${kind}:`;
    return [...this.tables.keys()]
      .filter((key) => key.startsWith(prefix))
      .map((key) => key.slice(prefix.length))
      .sort();
  }

  all(): GuidelineRecord[] {
    return [...this.tables.values()].flat();
  }

  get size(): number {
    let total = 0;
    for (const list of this.tables.values()) total += list.length;
    return total;
  }

  /** Content hash of one table; identical record sets hash identically. */
  fingerprint(ref: TableRef): string {
    const key = tableKey(ref);
    const cached = this.fingerprints.get(key);
    if (cached) return cached;

    const hash = createHash("sha256");
    for (const record of this.records(ref)) {
      hash.update(JSON.stringify(record));
      hash.update("\n");
    }
    const digest = hash.digest("hex").slice(0, 16);
    this.fingerprints.set(key, digest);
    return digest;
  }
}

function frozenCopy(values: readonly string[]): string[] {
  const copy = [...values];
  Object.freeze(copy);
  return copy;
}

function freezeRecord(record: GuidelineRecord): GuidelineRecord {
  const outputFields: GuidelineRecord["output_fields"] = {};
  for (const [field, value] of Object.entries(record.output_fields)) {
    outputFields[field] = Array.isArray(value) ? frozenCopy(value) : value;
  }
  Object.freeze(outputFields);

  const frozen: GuidelineRecord = {
    ...record,
    search_fields: frozenCopy(record.search_fields),
    output_fields: outputFields,
  };
  if (record.merged_from) {
    frozen.merged_from = frozenCopy(record.merged_from);
  }
  return Object.freeze(frozen);
}
