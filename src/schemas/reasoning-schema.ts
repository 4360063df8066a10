export const reasoningRuleSchema = {
  type: "object",
  properties: {
    name: { type: "string", minLength: 1 },
    when: {
      type: "object",
      properties: {
        terms: { type: "array", items: { type: "string" } },
        domains: { type: "array", items: { type: "string", minLength: 1 } },
      },
      required: ["terms"],
    },
    prefer: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
    boost: { type: "number" },
    note: { type: "string" },
  },
  required: ["name", "when", "prefer", "boost"],
} as const;
