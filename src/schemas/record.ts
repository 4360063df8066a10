export type TableKind = "domain" | "stack";

export type FieldValue = string | string[];

export type RecordOrigin = "builtin" | `external:${string}`;

export interface TableRef {
  kind: TableKind;
  name: string;
}

export interface GuidelineRecord {
  id: string;
  domain: string;
  kind: TableKind;
  /** Free-text fields fed to the ranker, in column order. */
  search_fields: string[];
  /** Display fields. Never scored. */
  output_fields: Record<string, FieldValue>;
  origin: RecordOrigin;
  priority_boost: number;
  /** External origins folded into a built-in record by the merge engine. */
  merged_from?: string[];
}

export type ConflictResolution = "used_external" | "used_builtin" | "merged_list";

export interface Conflict {
  domain: string;
  kind: TableKind;
  record_id: string;
  field: string;
  builtin_value: FieldValue;
  external_value: FieldValue;
  resolution: ConflictResolution;
  /** Origin of the external record that caused the conflict. */
  source: RecordOrigin;
}

export type IssueSeverity = "error" | "warning";

export interface ValidationIssue {
  file: string;
  row?: number;
  field?: string;
  message: string;
  severity: IssueSeverity;
}

export function tableKey(ref: TableRef): string {
  return `${ref.kind}:${ref.name}`;
}

export function isExternalOrigin(origin: RecordOrigin): boolean {
  return origin !== "builtin";
}
