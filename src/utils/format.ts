import type { FieldValue, ValidationIssue } from "../schemas/record.js";
import type { SearchResponse, SearchResult } from "../schemas/search.js";
import type { ConfigStatus, ValidationReport } from "./status.js";
import type { TableListing } from "./engine.js";

const MAX_FIELD_WIDTH = 300;

function truncate(text: string, maxLen = MAX_FIELD_WIDTH): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen) + "...";
}

function formatValue(value: FieldValue): string {
  return truncate(Array.isArray(value) ? value.join(", ") : value);
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}

function formatResult(result: SearchResult, position: number): string {
  const tags = [`score ${formatScore(result.score)}`];
  if (result.exact) tags.push("exact");
  if (result.origin !== "builtin") tags.push(result.origin);

  const lines = [`### Result ${position}: ${result.id} (${tags.join(", ")})`];
  for (const [field, value] of Object.entries(result.output_fields)) {
    lines.push(`- **${field}:** ${formatValue(value)}`);
  }
  for (const note of result.notes ?? []) {
    lines.push(`- _Note:_ ${note}`);
  }
  const brand = result.brand;
  if (brand) {
    for (const font of brand.fonts) {
      lines.push(`- _Brand font for ${font.field}:_ ${truncate(font.value, 80)} (generic: ${formatValue(font.generic)})`);
    }
    for (const warning of brand.accessibility) {
      lines.push(`- _Accessibility (${warning.field}):_ ${warning.message}`);
    }
  }
  return lines.join("\n");
}

/** Markdown rendering of a search response. */
export function formatSearchResponse(response: SearchResponse): string {
  const label = response.kind === "stack" ? "Stack" : "Domain";
  const lines = [
    "## Search Results",
    `**${label}:** ${response.domain} | **Query:** ${response.query}`,
    `**Source:** ${response.source} | **Found:** ${response.count} result${response.count === 1 ? "" : "s"}${response.brand_applied ? " | **Brand applied**" : ""}`,
  ];
  if (response.results.length === 0) {
    lines.push("", "No matching guidelines.");
    return lines.join("\n");
  }
  response.results.forEach((result, i) => {
    lines.push("", formatResult(result, i + 1));
  });
  return lines.join("\n");
}

export function formatIssue(issue: ValidationIssue): string {
  const location = issue.row !== undefined ? `${issue.file}:${issue.row}` : issue.file;
  const field = issue.field ? ` [${issue.field}]` : "";
  return `${location}${field} - ${issue.message}`;
}

export function formatStatus(status: ConfigStatus): string {
  const lines = [`External configuration: ${status.enabled ? "enabled" : "disabled"} (${status.config_path})`];
  if (status.enabled) {
    lines.push(`Version: ${status.version}`);
    lines.push(`Entries: ${status.entries.total} (${status.entries.domains} domain, ${status.entries.stacks} stack)`);
    lines.push(`Files: ${status.files.length > 0 ? status.files.join(", ") : "none"}`);
    lines.push(`Brand: ${status.brand_enabled ? "loaded" : "none"}`);
    lines.push(`Reasoning rules: ${status.reasoning_rules}`);
    lines.push(`Conflicts: ${status.conflicts}`);
    lines.push(`Limits: warn at ${status.performance.warn_entries}, max ${status.performance.max_entries}`);
  }
  lines.push(`Health: ${status.health}`);
  return lines.join("\n");
}

export function formatValidation(report: ValidationReport): string[] {
  return [
    ...report.errors.map((issue) => `error ${formatIssue(issue)}`),
    ...report.warnings.map((issue) => `warning ${formatIssue(issue)}`),
    ...report.performance.map((warning) => `warning ${warning.message}`),
  ];
}

export function formatTables(listing: TableListing): string {
  const lines = ["Domains:"];
  for (const table of listing.domains) {
    const tags = [`${table.records} records`];
    if (table.source === "custom") tags.push("custom");
    if (table.name === listing.default_domain) tags.push("default");
    lines.push(`  ${table.name} (${tags.join(", ")})`);
  }
  lines.push("Stacks:");
  for (const table of listing.stacks) {
    const tags = [`${table.records} records`];
    if (table.source === "custom") tags.push("custom");
    lines.push(`  ${table.name} (${tags.join(", ")})`);
  }
  return lines.join("\n");
}
