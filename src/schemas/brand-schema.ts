export const HEX_COLOR_PATTERN = "^#[0-9A-Fa-f]{6}$";

export const hexColorSchema = {
  type: "string",
  pattern: HEX_COLOR_PATTERN,
} as const;

export const fontSchema = {
  type: "object",
  properties: {
    name: { type: "string", minLength: 1 },
    fallback: {
      anyOf: [
        { type: "string" },
        { type: "array", items: { type: "string", minLength: 1 } },
      ],
    },
  },
  required: ["name"],
} as const;

export const typeScaleSchema = {
  anyOf: [
    { type: "number", exclusiveMinimum: 1 },
    { type: "string", pattern: "^[0-9]+(\\.[0-9]+)?$" },
  ],
} as const;

export const stylePreferencesSchema = {
  type: "object",
  properties: {
    preferred_styles: { type: "array", items: { type: "string", minLength: 1 } },
    avoided_styles: { type: "array", items: { type: "string", minLength: 1 } },
    design_philosophy: { type: "string" },
  },
} as const;
