// Type exports
export type {
  TableKind,
  TableRef,
  FieldValue,
  RecordOrigin,
  GuidelineRecord,
  Conflict,
  ConflictResolution,
  ValidationIssue,
  Catalog,
  Manifest,
  ExternalConfig,
  PerformanceInfo,
  PerformanceWarning,
  ReasoningRule,
  BrandProfile,
  ColorRole,
  FontSpec,
  SearchQuery,
  SearchResult,
  SearchResponse,
  AccessibilityWarning,
} from "./schemas/index.js";

export { DEFAULT_MANIFEST, COLOR_ROLES, defaultBrandProfile } from "./schemas/index.js";

// Engine
export { GuidelineEngine } from "./utils/engine.js";
export type { EngineOptions, EngineSnapshot, TableListing, TableSummary } from "./utils/engine.js";

// Ranking and routing
export { DomainIndex, tokenize, BM25_DEFAULTS } from "./utils/bm25.js";
export type { BM25Params, RankedRecord } from "./utils/bm25.js";
export { DomainRouter } from "./utils/router.js";
export { RecordStore } from "./utils/store.js";

// External configuration
export { loadExternalConfig, disabledConfig } from "./utils/external-config.js";
export { mergeExternal } from "./utils/merge.js";
export { getConfigStatus, validateExternalConfig } from "./utils/status.js";
export type { ConfigStatus, ValidationReport, ConfigHealth } from "./utils/status.js";
export { getConfigDir, initConfigDir } from "./utils/config.js";

// Brand
export { applyBrand, parseBrandProfile, generateCssVariables } from "./utils/brand.js";
export { checkContrast, WCAG_AA_NORMAL, WCAG_AA_LARGE } from "./utils/color.js";

// Errors and logging
export {
  SwatchbookError,
  UnknownDomainError,
  NoDomainConfiguredError,
  InvalidQueryError,
  InvalidCatalogError,
} from "./utils/errors.js";
export type { Logger } from "./utils/logger.js";
export { ConsoleLogger, SilentLogger } from "./utils/logger.js";
