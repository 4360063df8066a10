import type { TableRef } from "../schemas/record.js";
import { tableKey } from "../schemas/record.js";
import type { BM25Params } from "./bm25.js";
import { DomainIndex } from "./bm25.js";
import type { RecordStore } from "./store.js";

interface CacheEntry {
  fingerprint: string;
  index: DomainIndex;
}

/**
 * Built indexes keyed by table, each tagged with the content fingerprint it
 * was built from. A lookup with a different fingerprint builds a fresh index
 * and replaces the entry in one step.
 */
export class IndexCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly params: Partial<BM25Params>;
  private builds = 0;

  constructor(params: Partial<BM25Params> = {}) {
    this.params = params;
  }

  get(store: RecordStore, ref: TableRef): DomainIndex {
    const key = tableKey(ref);
    const fingerprint = store.fingerprint(ref);
    const cached = this.entries.get(key);
    if (cached && cached.fingerprint === fingerprint) {
      return cached.index;
    }
    const index = new DomainIndex(store.records(ref), this.params);
    this.entries.set(key, { fingerprint, index });
    this.builds++;
    return index;
  }

  /** Number of indexes built so far. */
  get buildCount(): number {
    return this.builds;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
