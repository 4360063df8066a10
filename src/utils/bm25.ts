/**
 * BM25 ranking over guideline records.
 *
 * Each record is one document: the concatenation of its `search_fields`.
 * Indexes are immutable once built; a changed record set gets a new index.
 */

import type { GuidelineRecord } from "../schemas/record.js";

/**
 * BM25 parameters
 * - k1: term frequency saturation
 * - b: length normalization
 */
export interface BM25Params {
  k1: number;
  b: number;
}

export const BM25_DEFAULTS: Readonly<BM25Params> = Object.freeze({ k1: 1.5, b: 0.75 });

/**
 * Lower-case and split on anything that is not a letter or digit.
 * Stopwords and short tokens are kept.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/** True when `phrase` occurs in `tokens` as a contiguous run. */
export function containsPhrase(tokens: readonly string[], phrase: readonly string[]): boolean {
  if (phrase.length === 0) return false;
  const last = tokens.length - phrase.length;
  for (let start = 0; start <= last; start++) {
    let hit = true;
    for (let i = 0; i < phrase.length; i++) {
      if (tokens[start + i] !== phrase[i]) {
        hit = false;
        break;
      }
    }
    if (hit) return true;
  }
  return false;
}

export interface RankedRecord {
  record: GuidelineRecord;
  score: number;
  /** Number of query tokens (counted per occurrence) found in the record. */
  overlap: number;
  /** Query equals the record id or one full search field. */
  exact: boolean;
}

export interface ScoreOptions {
  limit?: number;
  /** Drop records that share no token with the query and are not exact matches. */
  matchedOnly?: boolean;
}

interface IndexedDocument {
  record: GuidelineRecord;
  length: number;
  termFrequencies: Map<string, number>;
  exactKeys: Set<string>;
}

/**
 * Ordering shared by the ranker and every stage that re-scores results:
 * exact matches first, then score, then priority boost, then id.
 */
export function compareRanked(a: RankedRecord, b: RankedRecord): number {
  if (a.exact !== b.exact) return a.exact ? -1 : 1;
  if (a.score !== b.score) return b.score - a.score;
  if (a.record.priority_boost !== b.record.priority_boost) {
    return b.record.priority_boost - a.record.priority_boost;
  }
  if (a.record.id < b.record.id) return -1;
  if (a.record.id > b.record.id) return 1;
  return 0;
}

export class DomainIndex {
  readonly params: Readonly<BM25Params>;
  private readonly documents: IndexedDocument[];
  private readonly documentFrequencies: Map<string, number>;
  private readonly avgDocLength: number;

  constructor(records: readonly GuidelineRecord[], params: Partial<BM25Params> = {}) {
    this.params = Object.freeze({ ...BM25_DEFAULTS, ...params });
    this.documents = [];
    this.documentFrequencies = new Map();

    let totalLength = 0;
    for (const record of records) {
      const tokens = tokenize(record.search_fields.join(" "));
      const termFrequencies = new Map<string, number>();
      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }
      for (const term of termFrequencies.keys()) {
        this.documentFrequencies.set(term, (this.documentFrequencies.get(term) ?? 0) + 1);
      }

      const exactKeys = new Set<string>([normalizeExact(record.id)]);
      for (const field of record.search_fields) {
        const key = normalizeExact(field);
        if (key.length > 0) exactKeys.add(key);
      }

      this.documents.push({ record, length: tokens.length, termFrequencies, exactKeys });
      totalLength += tokens.length;
    }

    this.avgDocLength = this.documents.length > 0 ? totalLength / this.documents.length : 0;
  }

  get documentCount(): number {
    return this.documents.length;
  }

  get averageDocumentLength(): number {
    return this.avgDocLength;
  }

  documentFrequency(term: string): number {
    return this.documentFrequencies.get(term.toLowerCase()) ?? 0;
  }

  idf(term: string): number {
    const df = this.documentFrequency(term);
    const n = this.documents.length;
    return Math.log(1 + (n - df + 0.5) / (df + 0.5));
  }

  /**
   * Score every record against the query and return them in rank order.
   */
  score(query: string, options: ScoreOptions = {}): RankedRecord[] {
    const queryTerms = tokenize(query);
    const exactKey = normalizeExact(query);
    const { k1, b } = this.params;

    const idfCache = new Map<string, number>();
    for (const term of queryTerms) {
      if (!idfCache.has(term)) idfCache.set(term, this.idf(term));
    }

    const ranked: RankedRecord[] = [];
    for (const doc of this.documents) {
      let score = 0;
      let overlap = 0;
      const lengthRatio = this.avgDocLength > 0 ? doc.length / this.avgDocLength : 1;

      for (const term of queryTerms) {
        const tf = doc.termFrequencies.get(term) ?? 0;
        if (tf === 0) continue;
        overlap++;
        const numerator = tf * (k1 + 1);
        const denominator = tf + k1 * (1 - b + b * lengthRatio);
        score += (idfCache.get(term) ?? 0) * (numerator / denominator);
      }

      const exact = exactKey.length > 0 && doc.exactKeys.has(exactKey);
      if (options.matchedOnly && overlap === 0 && !exact) continue;

      ranked.push({
        record: doc.record,
        score: score + doc.record.priority_boost,
        overlap,
        exact,
      });
    }

    ranked.sort(compareRanked);
    return options.limit !== undefined ? ranked.slice(0, options.limit) : ranked;
  }
}

function normalizeExact(text: string): string {
  return text.trim().toLowerCase();
}
