import type { SearchResult } from "../schemas/search.js";
import type { RankedRecord } from "./bm25.js";

export function toSearchResult(ranked: RankedRecord): SearchResult {
  const { record } = ranked;
  return {
    id: record.id,
    domain: record.domain,
    kind: record.kind,
    origin: record.origin,
    output_fields: { ...record.output_fields },
    score: ranked.score,
    exact: ranked.exact,
  };
}

/**
 * Re-order after re-scoring: exact matches first, then score. Ties keep
 * their incoming order, which already encodes boost and id.
 */
export function sortResults(results: readonly SearchResult[]): SearchResult[] {
  return results
    .map((result, index) => ({ result, index }))
    .sort((a, b) => {
      if (a.result.exact !== b.result.exact) return a.result.exact ? -1 : 1;
      if (a.result.score !== b.result.score) return b.result.score - a.result.score;
      return a.index - b.index;
    })
    .map(({ result }) => result);
}
