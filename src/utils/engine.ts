import { join } from "node:path";
import type { Catalog } from "../schemas/catalog.js";
import type { ExternalConfig } from "../schemas/config.js";
import type { SearchQuery, SearchResponse } from "../schemas/search.js";
import { CATALOG_FILE, getBuiltinDataDir, loadCatalog } from "./catalog.js";
import { getConfigDir } from "./config.js";
import { discoverConfigFiles, loadExternalConfig, withConflicts } from "./external-config.js";
import { fingerprintFiles } from "./fingerprint.js";
import { IndexCache } from "./index-cache.js";
import type { BuiltinKnowledgeBase } from "./knowledge-base.js";
import { loadBuiltinStore } from "./knowledge-base.js";
import type { Logger } from "./logger.js";
import { SilentLogger } from "./logger.js";
import { mergeExternal } from "./merge.js";
import type { DomainRouter } from "./router.js";
import type { SearchContext } from "./search.js";
import { buildRouter, runSearch } from "./search.js";
import type { ConfigStatus, ValidationReport } from "./status.js";
import { getConfigStatus, validateExternalConfig } from "./status.js";
import type { RecordStore } from "./store.js";

export interface EngineOptions {
  /** External configuration directory; defaults to `.swatchbook` in the working directory. */
  configPath?: string;
  /** Built-in data directory holding catalog.yaml. */
  dataDir?: string;
  logger?: Logger;
}

export interface EngineSnapshot {
  fingerprint: string;
  catalog: Catalog;
  builtin: BuiltinKnowledgeBase;
  /** With the merge conflicts attached. */
  external: ExternalConfig;
  store: RecordStore;
  router: DomainRouter;
}

export interface TableSummary {
  name: string;
  records: number;
  /** `custom` for tables that only external configuration defines. */
  source: "builtin" | "custom";
}

export interface TableListing {
  domains: TableSummary[];
  stacks: TableSummary[];
  default_domain: string;
}

/**
 * Owns the built-in data and the external configuration. Every call checks a
 * file fingerprint and rebuilds the snapshot only when something changed;
 * concurrent callers share one rebuild, and readers never see a partial one.
 */
export class GuidelineEngine {
  readonly configPath: string;
  readonly dataDir: string;
  private readonly logger: Logger;
  private readonly cache = new IndexCache();
  private snapshot: EngineSnapshot | null = null;
  private pending: Promise<EngineSnapshot> | null = null;
  private rebuilds = 0;

  constructor(options: EngineOptions = {}) {
    this.configPath = options.configPath ?? getConfigDir();
    this.dataDir = options.dataDir ?? getBuiltinDataDir();
    this.logger = options.logger ?? new SilentLogger();
  }

  /** Number of snapshot rebuilds so far. */
  get rebuildCount(): number {
    return this.rebuilds;
  }

  /** Number of table indexes built so far. */
  get indexBuildCount(): number {
    return this.cache.buildCount;
  }

  async current(): Promise<EngineSnapshot> {
    if (this.pending) return this.pending;
    const snapshot = this.snapshot;
    if (!snapshot) return this.rebuild();
    if (snapshot.fingerprint === (await this.fingerprint(snapshot))) {
      return snapshot;
    }
    return this.rebuild();
  }

  /** Rebuild now, regardless of the fingerprint. */
  reload(): Promise<EngineSnapshot> {
    return this.rebuild();
  }

  async search(query: SearchQuery): Promise<SearchResponse> {
    const snapshot = await this.current();
    const ctx: SearchContext = {
      catalog: snapshot.catalog,
      store: snapshot.store,
      router: snapshot.router,
      external: snapshot.external,
      cache: this.cache,
    };
    return runSearch(ctx, query);
  }

  async status(): Promise<ConfigStatus> {
    return getConfigStatus((await this.current()).external);
  }

  async validate(): Promise<ValidationReport> {
    return validateExternalConfig((await this.current()).external);
  }

  async tables(): Promise<TableListing> {
    const { catalog, store, router } = await this.current();
    return {
      domains: router.domains
        .filter((name) => store.has({ kind: "domain", name }))
        .map((name): TableSummary => ({
          name,
          records: store.records({ kind: "domain", name }).length,
          source: Object.hasOwn(catalog.domains, name) ? "builtin" : "custom",
        })),
      stacks: store.names("stack").map((name): TableSummary => ({
        name,
        records: store.records({ kind: "stack", name }).length,
        source: Object.hasOwn(catalog.stacks, name) ? "builtin" : "custom",
      })),
      default_domain: catalog.default_domain,
    };
  }

  private rebuild(): Promise<EngineSnapshot> {
    if (this.pending) return this.pending;
    this.pending = this.build().finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  private async build(): Promise<EngineSnapshot> {
    const catalog = await loadCatalog(this.dataDir);
    const builtin = await loadBuiltinStore(catalog, this.dataDir, this.logger);
    const loaded = await loadExternalConfig(this.configPath, catalog, { logger: this.logger });
    const merged = mergeExternal(loaded, builtin.store);
    const external = withConflicts(loaded, merged.conflicts);

    const parts = { catalog, builtin, external, store: merged.store, router: buildRouter(catalog, external) };
    const snapshot: EngineSnapshot = { ...parts, fingerprint: await this.fingerprint(parts) };

    this.snapshot = snapshot;
    this.rebuilds++;
    this.logger.debug(
      `Loaded ${snapshot.store.size} records (${external.performance.current_entries} external, ${merged.conflicts.length} conflicts)`,
    );
    return snapshot;
  }

  /** Covers the files a snapshot was built from plus any config file that has appeared since. */
  private async fingerprint(snapshot: Pick<EngineSnapshot, "builtin" | "external">): Promise<string> {
    const paths = [join(this.dataDir, CATALOG_FILE), this.configPath];
    for (const file of await discoverConfigFiles(this.configPath)) {
      paths.push(join(this.configPath, file));
    }
    for (const file of snapshot.builtin.files) paths.push(join(this.dataDir, file));
    for (const file of snapshot.external.files) paths.push(join(this.configPath, file));
    return fingerprintFiles(paths);
  }
}
