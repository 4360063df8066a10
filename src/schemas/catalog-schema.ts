const columnList = {
  type: "array",
  items: { type: "string", minLength: 1 },
} as const;

const tableLayout = {
  type: "object",
  properties: {
    id_column: { type: "string", minLength: 1 },
    search_columns: { ...columnList, minItems: 1 },
    output_columns: columnList,
    list_columns: columnList,
  },
  required: ["id_column", "search_columns", "output_columns", "list_columns"],
} as const;

export const catalogSchema = {
  type: "object",
  properties: {
    version: { type: "string" },
    default_domain: { type: "string", minLength: 1 },
    max_results: { type: "integer", minimum: 1 },
    domains: {
      type: "object",
      minProperties: 1,
      additionalProperties: {
        type: "object",
        properties: {
          ...tableLayout.properties,
          file: { type: "string", minLength: 1 },
          keywords: columnList,
        },
        required: [...tableLayout.required, "file", "keywords"],
      },
    },
    stack_columns: tableLayout,
    stacks: {
      type: "object",
      additionalProperties: {
        type: "object",
        properties: { file: { type: "string", minLength: 1 } },
        required: ["file"],
      },
    },
    custom_domain: tableLayout,
  },
  required: ["version", "default_domain", "max_results", "domains", "stack_columns", "stacks", "custom_domain"],
} as const;
