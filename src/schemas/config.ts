import type { BrandProfile } from "./brand.js";
import type { Conflict, GuidelineRecord, ValidationIssue } from "./record.js";

export interface TableSelection {
  /** Table names to load; absent means every file in the directory. */
  enabled?: string[];
}

export interface DomainSelection extends TableSelection {
  /** Router keywords for custom domains, keyed by domain name. */
  keywords?: Record<string, string[]>;
}

export interface BrandSection {
  enabled: boolean;
  file: string;
}

export interface ReasoningSection {
  enabled: boolean;
  /** Rule files relative to the config directory; absent means reasoning/*.json. */
  files?: string[];
}

export interface PerformanceSection {
  max_entries: number;
  warn_entries: number;
}

export interface MergeSection {
  external_boost: number;
}

/** The manifest at the root of the config directory (config.yaml or config.json). */
export interface Manifest {
  version: string;
  enabled: boolean;
  domains: DomainSelection;
  stacks: TableSelection;
  brand: BrandSection;
  reasoning: ReasoningSection;
  performance: PerformanceSection;
  merge: MergeSection;
}

export const DEFAULT_MANIFEST: Manifest = {
  version: "1.0.0",
  enabled: true,
  domains: {},
  stacks: {},
  brand: { enabled: true, file: "brand/brand.json" },
  reasoning: { enabled: true },
  performance: { max_entries: 1000, warn_entries: 500 },
  merge: { external_boost: 0.1 },
};

export interface ExternalTable {
  records: GuidelineRecord[];
  files: string[];
  errors: ValidationIssue[];
}

export type PerformanceWarningKind = "threshold" | "limit_exceeded";

export interface PerformanceWarning {
  kind: PerformanceWarningKind;
  message: string;
}

export interface PerformanceInfo {
  max_entries: number;
  warn_entries: number;
  current_entries: number;
  dropped_entries: number;
  warnings: PerformanceWarning[];
}

export interface ReasoningRule {
  name: string;
  when: {
    terms: string[];
    domains?: string[];
  };
  prefer: string[];
  boost: number;
  note?: string;
  /** File the rule was read from. */
  source: string;
}

export interface ExternalConfig {
  enabled: boolean;
  config_path: string;
  version: string;
  domains: Record<string, ExternalTable>;
  stacks: Record<string, ExternalTable>;
  brand: BrandProfile | null;
  reasoning_rules: ReasoningRule[];
  conflicts: Conflict[];
  performance: PerformanceInfo;
  /** Issues against the manifest, brand and reasoning files. */
  issues: ValidationIssue[];
  domain_keywords: Record<string, string[]>;
  external_boost: number;
  /** Every file that contributed, relative to config_path. */
  files: string[];
}
