/**
 * Column layout of one knowledge-base table.
 */
export interface TableSpec {
  /** CSV file, relative to the data directory. Absent for custom tables. */
  file?: string;
  /** Column whose value identifies a row when no explicit `id` column is present. */
  id_column: string;
  search_columns: string[];
  output_columns: string[];
  /** Columns holding comma-separated lists. */
  list_columns: string[];
}

export interface DomainSpec extends TableSpec {
  /** Router keywords for this domain. */
  keywords: string[];
}

export interface Catalog {
  version: string;
  default_domain: string;
  max_results: number;
  domains: Record<string, DomainSpec>;
  stacks: Record<string, TableSpec>;
  /** Layout for external domain tables the catalog does not know. */
  custom_domain: TableSpec;
  /** Layout for external stack tables the catalog does not know. */
  custom_stack: TableSpec;
}

/** Shape of data/catalog.yaml before stack defaults are filled in. */
export interface CatalogFile {
  version: string;
  default_domain: string;
  max_results: number;
  domains: Record<string, DomainSpec>;
  stack_columns: Omit<TableSpec, "file">;
  stacks: Record<string, { file: string }>;
  custom_domain: TableSpec;
}
