import { readFile, readdir } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import yaml from "js-yaml";
import _Ajv from "ajv";
import type { ValidateFunction } from "ajv";
const Ajv = _Ajv.default ?? _Ajv;
import type { Catalog } from "../schemas/catalog.js";
import type {
  BrandSection,
  DomainSelection,
  ExternalConfig,
  ExternalTable,
  Manifest,
  MergeSection,
  PerformanceInfo,
  PerformanceSection,
  ReasoningRule,
  ReasoningSection,
  TableSelection,
} from "../schemas/config.js";
import { DEFAULT_MANIFEST } from "../schemas/config.js";
import type { BrandProfile } from "../schemas/brand.js";
import type { ManifestSection } from "../schemas/manifest-schema.js";
import { MANIFEST_SECTIONS, manifestSectionSchemas } from "../schemas/manifest-schema.js";
import type { GuidelineRecord, TableKind, ValidationIssue } from "../schemas/record.js";
import { parseBrandProfile } from "./brand.js";
import { tableSpecFor } from "./catalog.js";
import { errorMessage, isNotFound } from "./errors.js";
import type { Logger } from "./logger.js";
import { SilentLogger } from "./logger.js";
import { parseReasoningRules } from "./reasoning.js";
import { isObject, parseTable, tableFormat } from "./records.js";

export const MANIFEST_FILES = ["config.yaml", "config.yml", "config.json"];
export const DOMAINS_DIR = "domains";
export const STACKS_DIR = "stacks";
export const BRAND_DIR = "brand";
export const REASONING_DIR = "reasoning";

export interface LoadOptions {
  logger?: Logger;
}

/** An empty, disabled configuration: the built-in-only baseline. */
export function disabledConfig(configPath: string, version: string = DEFAULT_MANIFEST.version): ExternalConfig {
  return {
    enabled: false,
    config_path: configPath,
    version,
    domains: {},
    stacks: {},
    brand: null,
    reasoning_rules: [],
    conflicts: [],
    performance: emptyPerformance(DEFAULT_MANIFEST.performance),
    issues: [],
    domain_keywords: {},
    external_boost: DEFAULT_MANIFEST.merge.external_boost,
    files: [],
  };
}

function emptyPerformance(limits: PerformanceSection): PerformanceInfo {
  return {
    max_entries: limits.max_entries,
    warn_entries: limits.warn_entries,
    current_entries: 0,
    dropped_entries: 0,
    warnings: [],
  };
}

/**
 * Load the external configuration directory. A missing directory yields a
 * disabled configuration; a bad file or row is reported and skipped.
 */
export async function loadExternalConfig(
  configPath: string,
  catalog: Catalog,
  options: LoadOptions = {},
): Promise<ExternalConfig> {
  const logger = options.logger ?? new SilentLogger();
  const rootEntries = await listDir(configPath);
  if (rootEntries === null) {
    logger.debug(`No external configuration at ${configPath}`);
    return disabledConfig(configPath);
  }

  const files: string[] = [];
  const issues: ValidationIssue[] = [];

  const manifestFile = MANIFEST_FILES.find((name) => rootEntries.includes(name));
  const { manifest, declared } = manifestFile
    ? await loadManifest(configPath, manifestFile, issues)
    : { manifest: DEFAULT_MANIFEST, declared: new Set<ManifestSection>() };
  if (manifestFile) files.push(manifestFile);

  if (!manifest.enabled) {
    logger.debug(`External configuration at ${configPath} is disabled`);
    return { ...disabledConfig(configPath, manifest.version), issues, files };
  }

  const performance = emptyPerformance(manifest.performance);
  let loaded = 0;
  const admit = (records: GuidelineRecord[]): GuidelineRecord[] => {
    const room = Math.max(0, manifest.performance.max_entries - performance.current_entries);
    loaded += records.length;
    const kept = records.slice(0, room);
    performance.current_entries += kept.length;
    performance.dropped_entries += records.length - kept.length;
    return kept;
  };

  const domains = await loadTables(configPath, "domain", manifest.domains, catalog, manifest, admit, files, logger);
  const stacks = await loadTables(configPath, "stack", manifest.stacks, catalog, manifest, admit, files, logger);

  if (loaded > manifest.performance.warn_entries) {
    performance.warnings.push({
      kind: "threshold",
      message: `External configuration has ${loaded} entries, above the warning threshold of ${manifest.performance.warn_entries}`,
    });
  }
  if (performance.dropped_entries > 0) {
    performance.warnings.push({
      kind: "limit_exceeded",
      message: `External configuration has ${loaded} entries; ${performance.dropped_entries} beyond max_entries ${manifest.performance.max_entries} were dropped`,
    });
  }

  let brand: BrandProfile | null = null;
  if (manifest.brand.enabled) {
    brand = await loadBrand(configPath, manifest.brand, declared.has("brand"), issues, files);
  }

  let reasoningRules: ReasoningRule[] = [];
  if (manifest.reasoning.enabled) {
    reasoningRules = await loadReasoning(configPath, manifest.reasoning, issues, files);
  }

  const domainKeywords: Record<string, string[]> = {};
  for (const name of Object.keys(domains)) {
    if (!Object.hasOwn(catalog.domains, name)) {
      const keywords = manifest.domains.keywords;
      domainKeywords[name] = keywords && Object.hasOwn(keywords, name) ? keywords[name] : [name];
    }
  }
  for (const [name, words] of Object.entries(manifest.domains.keywords ?? {})) {
    if (Object.hasOwn(catalog.domains, name)) domainKeywords[name] = words;
  }

  logger.debug(
    `Loaded external configuration from ${configPath}: ${performance.current_entries} entries, ${files.length} files`,
  );

  return {
    enabled: true,
    config_path: configPath,
    version: manifest.version,
    domains,
    stacks,
    brand,
    reasoning_rules: reasoningRules,
    conflicts: [],
    performance,
    issues,
    domain_keywords: domainKeywords,
    external_boost: manifest.merge.external_boost,
    files,
  };
}

// --- Manifest ---

export interface LoadedManifest {
  manifest: Manifest;
  /** Sections the file set validly. */
  declared: Set<ManifestSection>;
}

async function loadManifest(configPath: string, file: string, issues: ValidationIssue[]): Promise<LoadedManifest> {
  let raw: unknown;
  try {
    raw = yaml.load(await readFile(join(configPath, file), "utf-8"));
  } catch (err) {
    issues.push({ file, message: `Could not parse manifest: ${errorMessage(err)}`, severity: "error" });
    return { manifest: DEFAULT_MANIFEST, declared: new Set() };
  }
  if (raw === undefined || raw === null) {
    return { manifest: DEFAULT_MANIFEST, declared: new Set() };
  }
  if (!isObject(raw)) {
    issues.push({ file, message: "Manifest must be a mapping; using defaults", severity: "error" });
    return { manifest: DEFAULT_MANIFEST, declared: new Set() };
  }
  return parseManifest(raw, file, issues);
}

/** Validate each section on its own; an invalid section falls back to its default. */
export function parseManifest(
  raw: Record<string, unknown>,
  file: string,
  issues: ValidationIssue[],
): LoadedManifest {
  const ajv = new Ajv({ allErrors: true });
  const declared = new Set<ManifestSection>();

  for (const key of Object.keys(raw)) {
    if (!MANIFEST_SECTIONS.some((section) => section === key)) {
      issues.push({ file, field: key, message: `Unknown manifest section "${key}"; ignored`, severity: "warning" });
    }
  }

  function section<T>(name: ManifestSection, validate: ValidateFunction<T>): T | undefined {
    const value = raw[name];
    if (value === undefined) return undefined;
    if (validate(value)) {
      declared.add(name);
      return value;
    }
    const details = (validate.errors ?? []).map((err) => `${err.instancePath} ${err.message}`.trim()).join("; ");
    issues.push({ file, field: name, message: `Invalid section "${name}" (${details}); using default`, severity: "error" });
    return undefined;
  }

  const version = section("version", ajv.compile<string>(manifestSectionSchemas.version));
  const enabled = section("enabled", ajv.compile<boolean>(manifestSectionSchemas.enabled));
  const domains = section("domains", ajv.compile<DomainSelection>(manifestSectionSchemas.domains));
  const stacks = section("stacks", ajv.compile<TableSelection>(manifestSectionSchemas.stacks));
  const brand = section("brand", ajv.compile<Partial<BrandSection>>(manifestSectionSchemas.brand));
  const reasoning = section("reasoning",
    ajv.compile<Partial<ReasoningSection>>(manifestSectionSchemas.reasoning),
  );
  const performance = section("performance",
    ajv.compile<Partial<PerformanceSection>>(manifestSectionSchemas.performance),
  );
  const merge = section("merge", ajv.compile<Partial<MergeSection>>(manifestSectionSchemas.merge));

  return {
    manifest: {
      version: version ?? DEFAULT_MANIFEST.version,
      enabled: enabled ?? DEFAULT_MANIFEST.enabled,
      domains: domains ?? DEFAULT_MANIFEST.domains,
      stacks: stacks ?? DEFAULT_MANIFEST.stacks,
      brand: { ...DEFAULT_MANIFEST.brand, ...brand },
      reasoning: { ...DEFAULT_MANIFEST.reasoning, ...reasoning },
      performance: { ...DEFAULT_MANIFEST.performance, ...performance },
      merge: { ...DEFAULT_MANIFEST.merge, ...merge },
    },
    declared,
  };
}

// --- Tables ---

async function loadTables(
  configPath: string,
  kind: TableKind,
  selection: TableSelection,
  catalog: Catalog,
  manifest: Manifest,
  admit: (records: GuidelineRecord[]) => GuidelineRecord[],
  files: string[],
  logger: Logger,
): Promise<Record<string, ExternalTable>> {
  const dir = kind === "domain" ? DOMAINS_DIR : STACKS_DIR;
  const entries = (await listDir(join(configPath, dir))) ?? [];
  const tables: Record<string, ExternalTable> = {};

  for (const entry of entries) {
    const format = tableFormat(entry);
    if (!format) continue;
    const table = basename(entry, extname(entry));
    if (selection.enabled && !selection.enabled.includes(table)) {
      logger.debug(`Skipping ${dir}/${entry}: not enabled in the manifest`);
      continue;
    }

    const file = `${dir}/${entry}`;
    if (!Object.hasOwn(tables, table)) {
      tables[table] = { records: [], files: [], errors: [] };
    }
    const target = tables[table];
    let text: string;
    try {
      text = await readFile(join(configPath, dir, entry), "utf-8");
    } catch (err) {
      target.errors.push({ file, message: `Could not read file: ${errorMessage(err)}`, severity: "error" });
      continue;
    }

    const parsed = parseTable(text, format, tableSpecFor(catalog, { kind, name: table }), {
      kind,
      table,
      origin: `external:${file}`,
      defaultBoost: manifest.merge.external_boost,
      file,
    });
    target.records.push(...admit(parsed.records));
    target.errors.push(...parsed.issues);
    target.files.push(file);
    files.push(file);
    logger.debug(`Loaded ${parsed.records.length} ${kind} records from ${file}`);
  }

  return tables;
}

// --- Brand & reasoning ---

async function loadBrand(
  configPath: string,
  section: BrandSection,
  declared: boolean,
  issues: ValidationIssue[],
  files: string[],
): Promise<BrandProfile | null> {
  const raw = await readJson(configPath, section.file, issues, declared);
  if (raw === undefined) return null;
  files.push(section.file);
  const parsed = parseBrandProfile(raw, section.file);
  issues.push(...parsed.issues);
  return parsed.profile;
}

async function loadReasoning(
  configPath: string,
  section: ReasoningSection,
  issues: ValidationIssue[],
  files: string[],
): Promise<ReasoningRule[]> {
  const listed = section.files !== undefined;
  const ruleFiles =
    section.files ??
    ((await listDir(join(configPath, REASONING_DIR))) ?? [])
      .filter((entry) => entry.toLowerCase().endsWith(".json"))
      .map((entry) => `${REASONING_DIR}/${entry}`);

  const rules: ReasoningRule[] = [];
  for (const file of ruleFiles) {
    const raw = await readJson(configPath, file, issues, listed);
    if (raw === undefined) continue;
    files.push(file);
    const parsed = parseReasoningRules(raw, file);
    rules.push(...parsed.rules);
    issues.push(...parsed.issues);
  }
  return rules;
}

/** Parsed JSON, or undefined when the file is missing or malformed (reported in `issues`). */
async function readJson(
  configPath: string,
  file: string,
  issues: ValidationIssue[],
  reportMissing: boolean,
): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(join(configPath, file), "utf-8");
  } catch (err) {
    if (!isNotFound(err)) {
      issues.push({ file, message: `Could not read file: ${errorMessage(err)}`, severity: "error" });
    } else if (reportMissing) {
      issues.push({ file, message: "File not found", severity: "warning" });
    }
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    issues.push({ file, message: `Malformed JSON: ${errorMessage(err)}`, severity: "error" });
    return undefined;
  }
}

// --- Discovery ---

/** Sorted entries of a directory, or null when it does not exist. */
async function listDir(dir: string): Promise<string[] | null> {
  try {
    return (await readdir(dir)).sort();
  } catch (err) {
    if (isNotFound(err) || (err instanceof Error && "code" in err && err.code === "ENOTDIR")) {
      return null;
    }
    throw err;
  }
}

/**
 * Every file that could contribute to the configuration, relative to the
 * config directory. Used for change detection.
 */
export async function discoverConfigFiles(configPath: string): Promise<string[]> {
  const root = await listDir(configPath);
  if (root === null) return [];

  const found = MANIFEST_FILES.filter((name) => root.includes(name));
  for (const dir of [DOMAINS_DIR, STACKS_DIR]) {
    for (const entry of (await listDir(join(configPath, dir))) ?? []) {
      if (tableFormat(entry)) found.push(`${dir}/${entry}`);
    }
  }
  for (const dir of [BRAND_DIR, REASONING_DIR]) {
    for (const entry of (await listDir(join(configPath, dir))) ?? []) {
      if (entry.toLowerCase().endsWith(".json")) found.push(`${dir}/${entry}`);
    }
  }
  return found.sort();
}

export function withConflicts(config: ExternalConfig, conflicts: ExternalConfig["conflicts"]): ExternalConfig {
  return { ...config, conflicts };
}
