const stringList = {
  type: "array",
  items: { type: "string", minLength: 1 },
} as const;

const tableSelection = {
  type: "object",
  properties: {
    enabled: stringList,
  },
} as const;

/**
 * One schema per manifest section so a bad section can be dropped on its own.
 */
export const manifestSectionSchemas = {
  version: { type: "string", minLength: 1 },
  enabled: { type: "boolean" },
  domains: {
    type: "object",
    properties: {
      enabled: stringList,
      keywords: {
        type: "object",
        additionalProperties: stringList,
      },
    },
  },
  stacks: tableSelection,
  brand: {
    type: "object",
    properties: {
      enabled: { type: "boolean" },
      file: { type: "string", minLength: 1 },
    },
  },
  reasoning: {
    type: "object",
    properties: {
      enabled: { type: "boolean" },
      files: stringList,
    },
  },
  performance: {
    type: "object",
    properties: {
      max_entries: { type: "integer", minimum: 1 },
      warn_entries: { type: "integer", minimum: 1 },
    },
  },
  merge: {
    type: "object",
    properties: {
      external_boost: { type: "number", minimum: 0 },
    },
  },
} as const;

export type ManifestSection = keyof typeof manifestSectionSchemas;

export const MANIFEST_SECTIONS: ManifestSection[] = [
  "version",
  "enabled",
  "domains",
  "stacks",
  "brand",
  "reasoning",
  "performance",
  "merge",
];
