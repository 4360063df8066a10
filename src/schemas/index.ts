export type {
  TableKind,
  TableRef,
  FieldValue,
  RecordOrigin,
  GuidelineRecord,
  Conflict,
  ConflictResolution,
  IssueSeverity,
  ValidationIssue,
} from "./record.js";
export { tableKey, isExternalOrigin } from "./record.js";

export type { TableSpec, DomainSpec, Catalog, CatalogFile } from "./catalog.js";

export type {
  Manifest,
  ExternalConfig,
  ExternalTable,
  PerformanceInfo,
  PerformanceWarning,
  ReasoningRule,
} from "./config.js";
export { DEFAULT_MANIFEST } from "./config.js";

export type {
  BrandProfile,
  ColorRole,
  FontSpec,
  BrandTypography,
  StylePreferences,
} from "./brand.js";
export { COLOR_ROLES, DEFAULT_BRAND_COLORS, defaultBrandProfile } from "./brand.js";

export { manifestSectionSchemas } from "./manifest-schema.js";
export { hexColorSchema, fontSchema, stylePreferencesSchema } from "./brand-schema.js";
export { reasoningRuleSchema } from "./reasoning-schema.js";
export { catalogSchema } from "./catalog-schema.js";

export type {
  SearchQuery,
  SearchResult,
  SearchResponse,
  ResultSource,
  ExternalSummary,
  BrandAnnotation,
  ColorSubstitution,
  FontSubstitution,
  AccessibilityWarning,
  StyleAdjustment,
} from "./search.js";
