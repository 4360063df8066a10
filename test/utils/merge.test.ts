import { describe, it, expect } from "vitest";
import { mergeExternal, mergeLists } from "../../src/utils/merge.js";
import { disabledConfig } from "../../src/utils/external-config.js";
import { RecordStore } from "../../src/utils/store.js";
import type { ExternalConfig, ExternalTable } from "../../src/schemas/config.js";
import type { GuidelineRecord } from "../../src/schemas/record.js";
import { makeRecord } from "../helpers.js";

const style = { kind: "domain", name: "style" } as const;
const origin = "external:domains/style.csv";

function builtinStore(): RecordStore {
  return RecordStore.fromRecords([
    makeRecord("Minimalism", ["Minimalism", "clean, simple"], {
      output_fields: { "Style Category": "Minimalism", Keywords: ["clean", "simple"], Complexity: "Low" },
    }),
    makeRecord("Brutalism", ["Brutalism", "raw"], { output_fields: { "Style Category": "Brutalism" } }),
  ]);
}

function table(records: GuidelineRecord[]): ExternalTable {
  return { records, files: ["domains/style.csv"], errors: [] };
}

function external(domains: Record<string, ExternalTable>, stacks: Record<string, ExternalTable> = {}): ExternalConfig {
  return { ...disabledConfig("/project/.swatchbook"), enabled: true, domains, stacks };
}

const override = makeRecord("Minimalism", ["Minimalism", "brutalist, raw"], {
  origin,
  priority_boost: 0.1,
  output_fields: {
    "Style Category": "Minimalism",
    Keywords: ["Clean", "brutalist"],
    Complexity: "High",
    Notes: "Team favourite",
  },
});

describe("mergeExternal", () => {
  it("resolves field conflicts per field kind", () => {
    const { store, conflicts } = mergeExternal(external({ style: table([override]) }), builtinStore());
    const [minimal, brutal] = store.records(style);

    expect(minimal).toEqual({
      id: "Minimalism",
      domain: "style",
      kind: "domain",
      search_fields: ["Minimalism", "clean, simple"],
      output_fields: {
        "Style Category": "Minimalism",
        Keywords: ["clean", "simple", "brutalist"],
        Complexity: "High",
        Notes: "Team favourite",
      },
      origin: "builtin",
      priority_boost: 0,
      merged_from: [origin],
    });
    expect(brutal.id).toBe("Brutalism");

    expect(conflicts.map((c) => [c.record_id, c.field, c.resolution])).toEqual([
      ["Minimalism", "search_fields", "used_builtin"],
      ["Minimalism", "Keywords", "merged_list"],
      ["Minimalism", "Complexity", "used_external"],
    ]);
    expect(conflicts[2]).toEqual({
      domain: "style",
      kind: "domain",
      record_id: "Minimalism",
      field: "Complexity",
      builtin_value: "Low",
      external_value: "High",
      resolution: "used_external",
      source: origin,
    });
  });

  it("appends records and tables with no built-in counterpart", () => {
    const soft = makeRecord("Soft UI", ["Soft UI"], { origin });
    const svelte = makeRecord("Use stores", ["Use stores"], {
      kind: "stack",
      domain: "svelte",
      origin: "external:stacks/svelte.csv",
    });
    const { store, conflicts } = mergeExternal(
      external({ style: table([soft]) }, { svelte: table([svelte]) }),
      builtinStore(),
    );

    expect(store.records(style).map((r) => r.id)).toEqual(["Minimalism", "Brutalism", "Soft UI"]);
    expect(store.records({ kind: "stack", name: "svelte" })).toEqual([svelte]);
    expect(conflicts).toEqual([]);
  });

  it("is pure and repeatable", () => {
    const builtin = builtinStore();
    const config = external({ style: table([override]) });
    const first = mergeExternal(config, builtin);
    const second = mergeExternal(config, builtin);

    expect(second.conflicts).toEqual(first.conflicts);
    expect(second.store.all()).toEqual(first.store.all());
    expect(builtin.records(style)[0].output_fields.Complexity).toBe("Low");
    expect(builtin.records(style)[0].merged_from).toBeUndefined();
  });

  it("records nothing when the external row matches the built-in one", () => {
    const same = makeRecord("Brutalism", ["Brutalism", "raw"], {
      origin,
      output_fields: { "Style Category": "Brutalism" },
    });
    const { store, conflicts } = mergeExternal(external({ style: table([same]) }), builtinStore());
    expect(conflicts).toEqual([]);
    expect(store.records(style)[1].merged_from).toEqual([origin]);
  });

  it("returns the built-in records unchanged without external tables", () => {
    const builtin = builtinStore();
    const { store } = mergeExternal(external({}), builtin);
    expect(store.all()).toEqual(builtin.all());
  });
});

describe("mergeLists", () => {
  it("keeps the first spelling of case-insensitive duplicates", () => {
    expect(mergeLists(["Clean", "simple"], ["clean ", "bold"])).toEqual(["Clean", "simple", "bold"]);
  });

  it("treats single strings as one-item lists", () => {
    expect(mergeLists("a", ["b", "A"])).toEqual(["a", "b"]);
  });
});
