import type { Catalog } from "../schemas/catalog.js";
import type { ExternalConfig } from "../schemas/config.js";
import type { TableRef } from "../schemas/record.js";
import { isExternalOrigin } from "../schemas/record.js";
import type { ExternalSummary, SearchQuery, SearchResponse } from "../schemas/search.js";
import { applyBrand } from "./brand.js";
import { catalogKeywords } from "./catalog.js";
import { InvalidQueryError, UnknownDomainError } from "./errors.js";
import type { IndexCache } from "./index-cache.js";
import { applyReasoningRules } from "./reasoning.js";
import { sortResults, toSearchResult } from "./results.js";
import { DomainRouter } from "./router.js";
import type { RecordStore } from "./store.js";

export interface SearchContext {
  catalog: Catalog;
  /** Effective records: built-in merged with external. */
  store: RecordStore;
  router: DomainRouter;
  external: ExternalConfig;
  cache: IndexCache;
}

/**
 * Router over the catalog's domains plus external keywords. Built-in domains
 * keep catalog order; custom domains follow.
 */
export function buildRouter(catalog: Catalog, external: ExternalConfig): DomainRouter {
  const table = catalogKeywords(catalog);
  for (const [domain, words] of Object.entries(external.domain_keywords)) {
    const current = table.get(domain) ?? [];
    const merged = [...current];
    for (const word of words) {
      if (!merged.some((existing) => existing.toLowerCase() === word.toLowerCase())) merged.push(word);
    }
    table.set(domain, merged);
  }
  return new DomainRouter(table, catalog.default_domain);
}

export function resolveLimit(limit: number | undefined, fallback: number): number {
  if (limit === undefined) return fallback;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidQueryError(`limit must be a positive integer, got ${limit}`);
  }
  return limit;
}

/** Resolve the table a query targets. A stack takes precedence over any domain. */
export function resolveTable(ctx: SearchContext, query: SearchQuery): TableRef {
  if (query.stack !== undefined) {
    const ref: TableRef = { kind: "stack", name: query.stack };
    if (!ctx.store.has(ref)) {
      throw new UnknownDomainError(query.stack, "stack", ctx.store.names("stack"));
    }
    return ref;
  }
  const ref: TableRef = { kind: "domain", name: ctx.router.resolve(query.text, query.domain) };
  if (!ctx.store.has(ref)) {
    throw new UnknownDomainError(ref.name, "domain", ctx.store.names("domain"));
  }
  return ref;
}

export function summarizeExternal(external: ExternalConfig): ExternalSummary {
  const fileCount = (tables: ExternalConfig["domains"]) =>
    Object.values(tables).reduce((sum, table) => sum + table.files.length, 0);
  return {
    enabled: external.enabled,
    domains_loaded: fileCount(external.domains),
    stacks_loaded: fileCount(external.stacks),
    brand_enabled: external.brand !== null,
    total_external_entries: external.performance.current_entries,
  };
}

/**
 * Rank one table for a query, then apply reasoning rules and the brand
 * profile. Only records sharing a token with the query (or matching it
 * exactly) are returned.
 */
export function runSearch(ctx: SearchContext, query: SearchQuery): SearchResponse {
  const limit = resolveLimit(query.limit, ctx.catalog.max_results);
  const ref = resolveTable(ctx, query);
  const index = ctx.cache.get(ctx.store, ref);

  let results = index.score(query.text, { matchedOnly: true }).map(toSearchResult);

  if (ctx.external.reasoning_rules.length > 0) {
    results = sortResults(applyReasoningRules(results, ctx.external.reasoning_rules, query.text, ref.name));
  }

  const brand = query.applyBrand === false ? null : ctx.external.brand;
  if (brand) {
    results = applyBrand(results, brand, { queryText: query.text });
  }

  results = results.slice(0, limit);
  const merged = ctx.store
    .records(ref)
    .some((record) => isExternalOrigin(record.origin) || (record.merged_from?.length ?? 0) > 0);

  return {
    domain: ref.name,
    kind: ref.kind,
    query: query.text,
    count: results.length,
    source: merged ? "merged" : "builtin",
    brand_applied: brand !== null,
    results,
    external: summarizeExternal(ctx.external),
  };
}
