import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import _Ajv from "ajv";
const Ajv = _Ajv.default ?? _Ajv;
import type { Catalog, CatalogFile, TableSpec } from "../schemas/catalog.js";
import { catalogSchema } from "../schemas/catalog-schema.js";
import type { TableRef } from "../schemas/record.js";
import { InvalidCatalogError, errorMessage } from "./errors.js";

export const CATALOG_FILE = "catalog.yaml";

/**
 * Locate the bundled `data/` directory by walking up from this module,
 * so the same lookup works from `src/` and from `dist/src/`.
 */
export function getBuiltinDataDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, "data");
    if (existsSync(join(candidate, CATALOG_FILE))) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new InvalidCatalogError(CATALOG_FILE, "built-in data directory not found");
    }
    dir = parent;
  }
}

export async function loadCatalog(dataDir: string = getBuiltinDataDir()): Promise<Catalog> {
  const path = join(dataDir, CATALOG_FILE);
  let raw: unknown;
  try {
    raw = yaml.load(await readFile(path, "utf-8"));
  } catch (err) {
    throw new InvalidCatalogError(path, errorMessage(err));
  }
  return buildCatalog(raw, path);
}

/** Validate a parsed catalog and expand the shared stack layout into each stack. */
export function buildCatalog(raw: unknown, path: string = CATALOG_FILE): Catalog {
  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<CatalogFile>(catalogSchema);
  if (!validate(raw)) {
    const details = (validate.errors ?? []).map((err) => `${err.instancePath} ${err.message}`).join("; ");
    throw new InvalidCatalogError(path, details);
  }
  if (!Object.hasOwn(raw.domains, raw.default_domain)) {
    throw new InvalidCatalogError(path, `default_domain "${raw.default_domain}" is not a declared domain`);
  }

  const stacks: Record<string, TableSpec> = {};
  for (const [name, entry] of Object.entries(raw.stacks)) {
    stacks[name] = { ...raw.stack_columns, file: entry.file };
  }

  return {
    version: raw.version,
    default_domain: raw.default_domain,
    max_results: raw.max_results,
    domains: raw.domains,
    stacks,
    custom_domain: raw.custom_domain,
    custom_stack: { ...raw.stack_columns },
  };
}

/** Column layout for a table, falling back to the custom layout for unknown names. */
export function tableSpecFor(catalog: Catalog, ref: TableRef): TableSpec {
  if (ref.kind === "stack") {
    return Object.hasOwn(catalog.stacks, ref.name) ? catalog.stacks[ref.name] : catalog.custom_stack;
  }
  return Object.hasOwn(catalog.domains, ref.name) ? catalog.domains[ref.name] : catalog.custom_domain;
}

/** Router keywords for built-in domains, in catalog order. */
export function catalogKeywords(catalog: Catalog): Map<string, string[]> {
  const table = new Map<string, string[]>();
  for (const [name, spec] of Object.entries(catalog.domains)) {
    table.set(name, [...spec.keywords]);
  }
  return table;
}
