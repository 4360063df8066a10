import { describe, it, expect } from "vitest";
import { RecordStore } from "../../src/utils/store.js";
import { IndexCache } from "../../src/utils/index-cache.js";
import { makeRecord } from "../helpers.js";

const style = { kind: "domain", name: "style" } as const;
const react = { kind: "stack", name: "react" } as const;

describe("RecordStore", () => {
  it("groups records by table and keeps input order", () => {
    const store = RecordStore.fromRecords([
      makeRecord("b", ["x"]),
      makeRecord("hooks", ["y"], { kind: "stack", domain: "react" }),
      makeRecord("a", ["z"]),
    ]);
    expect(store.records(style).map((r) => r.id)).toEqual(["b", "a"]);
    expect(store.names("stack")).toEqual(["react"]);
    expect(store.has(react)).toBe(true);
    expect(store.has({ kind: "domain", name: "color" })).toBe(false);
    expect(store.size).toBe(3);
  });

  it("freezes records and their field lists", () => {
    const store = RecordStore.fromRecords([makeRecord("a", ["x"], { output_fields: { Keywords: ["k"] } })]);
    const [record] = store.records(style);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.search_fields)).toBe(true);
    expect(Object.isFrozen(record.output_fields.Keywords)).toBe(true);
  });

  it("does not share arrays with the input records", () => {
    const input = makeRecord("a", ["x"]);
    const store = RecordStore.fromRecords([input]);
    input.search_fields.push("late");
    expect(store.records(style)[0].search_fields).toEqual(["x"]);
  });

  it("fingerprints identical content identically", () => {
    const first = RecordStore.fromRecords([makeRecord("a", ["x"])]);
    const second = RecordStore.fromRecords([makeRecord("a", ["x"])]);
    const changed = RecordStore.fromRecords([makeRecord("a", ["y"])]);
    expect(first.fingerprint(style)).toBe(second.fingerprint(style));
    expect(first.fingerprint(style)).not.toBe(changed.fingerprint(style));
    expect(first.fingerprint(style)).toMatch(/^[0-9a-f]{16}$/);
  });

  it("is empty by default", () => {
    const store = RecordStore.empty();
    expect(store.size).toBe(0);
    expect(store.records(style)).toEqual([]);
    expect(store.all()).toEqual([]);
  });
});

describe("IndexCache", () => {
  it("reuses an index while the table content is unchanged", () => {
    const cache = new IndexCache();
    const first = RecordStore.fromRecords([makeRecord("a", ["x"])]);
    const same = RecordStore.fromRecords([makeRecord("a", ["x"])]);

    const index = cache.get(first, style);
    expect(cache.get(same, style)).toBe(index);
    expect(cache.buildCount).toBe(1);
  });

  it("rebuilds when the content changes", () => {
    const cache = new IndexCache();
    cache.get(RecordStore.fromRecords([makeRecord("a", ["x"])]), style);
    const index = cache.get(RecordStore.fromRecords([makeRecord("a", ["x"]), makeRecord("b", ["y"])]), style);
    expect(index.documentCount).toBe(2);
    expect(cache.buildCount).toBe(2);
    expect(cache.size).toBe(1);
  });

  it("keeps one entry per table", () => {
    const cache = new IndexCache();
    const store = RecordStore.fromRecords([
      makeRecord("a", ["x"]),
      makeRecord("hooks", ["y"], { kind: "stack", domain: "react" }),
    ]);
    cache.get(store, style);
    cache.get(store, react);
    expect(cache.size).toBe(2);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it("passes BM25 parameters to the indexes it builds", () => {
    const cache = new IndexCache({ k1: 2 });
    const index = cache.get(RecordStore.fromRecords([makeRecord("a", ["x"])]), style);
    expect(index.params).toEqual({ k1: 2, b: 0.75 });
  });
});
