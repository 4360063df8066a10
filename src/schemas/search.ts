import type { ColorRole } from "./brand.js";
import type { FieldValue, RecordOrigin, TableKind } from "./record.js";

export interface SearchQuery {
  text: string;
  domain?: string;
  stack?: string;
  /** Positive integer; defaults to the catalog's max_results. */
  limit?: number;
  /** Default true. Has no effect without a brand profile. */
  applyBrand?: boolean;
}

export interface ColorSubstitution {
  field: string;
  role: ColorRole;
  value: string;
  original: FieldValue;
}

export interface FontSubstitution {
  field: string;
  role: string;
  value: string;
  /** The recommendation the brand font replaced. */
  generic: FieldValue;
}

export interface AccessibilityWarning {
  field: string;
  role: ColorRole;
  color: string;
  background: string;
  ratio: number;
  required: number;
  passes_large_text: boolean;
  message: string;
}

export interface StyleAdjustment {
  multiplier: number;
  preferred: string[];
  avoided: string[];
  philosophy: string | null;
}

export interface BrandAnnotation {
  colors: ColorSubstitution[];
  fonts: FontSubstitution[];
  style: StyleAdjustment | null;
  accessibility: AccessibilityWarning[];
}

export interface SearchResult {
  id: string;
  domain: string;
  kind: TableKind;
  origin: RecordOrigin;
  output_fields: Record<string, FieldValue>;
  score: number;
  exact: boolean;
  /** Notes attached by reasoning rules. */
  notes?: string[];
  brand?: BrandAnnotation;
}

export interface ExternalSummary {
  enabled: boolean;
  domains_loaded: number;
  stacks_loaded: number;
  brand_enabled: boolean;
  total_external_entries: number;
}

export type ResultSource = "builtin" | "merged";

export interface SearchResponse {
  domain: string;
  kind: TableKind;
  query: string;
  count: number;
  /** `merged` when the searched table holds any external record. */
  source: ResultSource;
  brand_applied: boolean;
  results: SearchResult[];
  external: ExternalSummary;
}
