import type { ExternalConfig, ExternalTable } from "../schemas/config.js";
import type { Conflict, FieldValue, GuidelineRecord, TableKind } from "../schemas/record.js";
import { tableKey } from "../schemas/record.js";
import { RecordStore } from "./store.js";

export interface MergeResult {
  store: RecordStore;
  conflicts: Conflict[];
}

/**
 * Layer external records over the built-in store.
 *
 * For a record whose `(kind, domain, id)` already exists:
 * - `search_fields` keep the existing value (`used_builtin`);
 * - list-valued output fields are concatenated and de-duplicated (`merged_list`);
 * - other output fields take the external value (`used_external`).
 *
 * Records without a counterpart are appended. Pure: the same inputs always
 * give an equal store and conflict list.
 */
export function mergeExternal(external: ExternalConfig, builtin: RecordStore): MergeResult {
  const tables = new Map<string, GuidelineRecord[]>();
  const positions = new Map<string, Map<string, number>>();

  for (const record of builtin.all()) {
    const key = tableKey({ kind: record.kind, name: record.domain });
    const list = tables.get(key) ?? [];
    const ids = positions.get(key) ?? new Map<string, number>();
    ids.set(record.id, list.length);
    list.push(record);
    tables.set(key, list);
    positions.set(key, ids);
  }

  const conflicts: Conflict[] = [];
  const seen = new Set<string>();
  const log = (conflict: Conflict) => {
    const key = JSON.stringify(conflict);
    if (seen.has(key)) return;
    seen.add(key);
    conflicts.push(conflict);
  };

  const layers: [TableKind, Record<string, ExternalTable>][] = [
    ["domain", external.domains],
    ["stack", external.stacks],
  ];
  for (const [kind, externalTables] of layers) {
    for (const [name, table] of Object.entries(externalTables)) {
      const key = tableKey({ kind, name });
      const list = tables.get(key) ?? [];
      const ids = positions.get(key) ?? new Map<string, number>();
      tables.set(key, list);
      positions.set(key, ids);

      for (const record of table.records) {
        const at = ids.get(record.id);
        if (at === undefined) {
          ids.set(record.id, list.length);
          list.push(record);
        } else {
          list[at] = mergeRecord(list[at], record, log);
        }
      }
    }
  }

  return { store: RecordStore.fromRecords([...tables.values()].flat()), conflicts };
}

function mergeRecord(
  base: GuidelineRecord,
  incoming: GuidelineRecord,
  log: (conflict: Conflict) => void,
): GuidelineRecord {
  const conflict = (
    field: string,
    builtinValue: FieldValue,
    externalValue: FieldValue,
    resolution: Conflict["resolution"],
  ): Conflict => ({
    domain: base.domain,
    kind: base.kind,
    record_id: base.id,
    field,
    builtin_value: builtinValue,
    external_value: externalValue,
    resolution,
    source: incoming.origin,
  });

  if (!sameValue(base.search_fields, incoming.search_fields)) {
    log(conflict("search_fields", base.search_fields, incoming.search_fields, "used_builtin"));
  }

  const outputFields: Record<string, FieldValue> = { ...base.output_fields };
  for (const [field, value] of Object.entries(incoming.output_fields)) {
    if (!Object.hasOwn(base.output_fields, field)) {
      outputFields[field] = value;
      continue;
    }
    const current = base.output_fields[field];
    if (sameValue(current, value)) continue;
    if (Array.isArray(current) || Array.isArray(value)) {
      outputFields[field] = mergeLists(current, value);
      log(conflict(field, current, value, "merged_list"));
    } else {
      outputFields[field] = value;
      log(conflict(field, current, value, "used_external"));
    }
  }

  const mergedFrom = [...(base.merged_from ?? [])];
  if (!mergedFrom.includes(incoming.origin)) mergedFrom.push(incoming.origin);

  return { ...base, output_fields: outputFields, merged_from: mergedFrom };
}

/** Concatenate, dropping case-insensitive duplicates; the first spelling wins. */
export function mergeLists(first: FieldValue, second: FieldValue): string[] {
  const merged: string[] = [];
  const seen = new Set<string>();
  for (const item of [...toList(first), ...toList(second)]) {
    const key = item.trim().toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(item);
  }
  return merged;
}

function toList(value: FieldValue): string[] {
  return Array.isArray(value) ? value : [value];
}

function sameValue(a: FieldValue, b: FieldValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}
