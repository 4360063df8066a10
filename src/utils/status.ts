import type { ExternalConfig, PerformanceInfo, PerformanceWarning } from "../schemas/config.js";
import type { ValidationIssue } from "../schemas/record.js";

export type ConfigHealth = "healthy" | "warning" | "error";

export interface ConfigStatus {
  enabled: boolean;
  config_path: string;
  version: string;
  files: string[];
  entries: { domains: number; stacks: number; total: number };
  brand_enabled: boolean;
  reasoning_rules: number;
  conflicts: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  performance: PerformanceInfo;
  health: ConfigHealth;
}

export interface ValidationReport {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  performance: PerformanceWarning[];
}

/** Every issue from the manifest, brand, reasoning and table files. */
export function collectIssues(external: ExternalConfig): ValidationIssue[] {
  const issues = [...external.issues];
  for (const table of [...Object.values(external.domains), ...Object.values(external.stacks)]) {
    issues.push(...table.errors);
  }
  return issues;
}

export function configHealth(errors: number, warnings: number): ConfigHealth {
  if (errors > 0) return "error";
  if (warnings > 0) return "warning";
  return "healthy";
}

export function getConfigStatus(external: ExternalConfig): ConfigStatus {
  const issues = collectIssues(external);
  const errors = issues.filter((issue) => issue.severity === "error");
  const warnings = issues.filter((issue) => issue.severity === "warning");
  const count = (tables: ExternalConfig["domains"]) =>
    Object.values(tables).reduce((sum, table) => sum + table.records.length, 0);
  const domains = count(external.domains);
  const stacks = count(external.stacks);

  return {
    enabled: external.enabled,
    config_path: external.config_path,
    version: external.version,
    files: [...external.files],
    entries: { domains, stacks, total: domains + stacks },
    brand_enabled: external.brand !== null,
    reasoning_rules: external.reasoning_rules.length,
    conflicts: external.conflicts.length,
    errors,
    warnings,
    performance: external.performance,
    health: configHealth(errors.length, warnings.length + external.performance.warnings.length),
  };
}

export function validateExternalConfig(external: ExternalConfig): ValidationReport {
  const issues = collectIssues(external);
  const errors = issues.filter((issue) => issue.severity === "error");
  return {
    valid: errors.length === 0,
    errors,
    warnings: issues.filter((issue) => issue.severity === "warning"),
    performance: [...external.performance.warnings],
  };
}
