export const institutionSchema = {
  type: "object",
  properties: {
    name: { type: "string" },
    id: { type: "string" },
  },
  required: ["name"],
} as const;

export const authorSchema = {
  type: "object",
  properties: {
    name: { type: "string" },
    id: { type: "string" },
    institutions: { type: "array", items: institutionSchema },
  },
  required: ["name", "institutions"],
} as const;

export const workSchema = {
  type: "object",
  properties: {
    title: { type: "string" },
    ids: { type: "object", additionalProperties: { type: "string" } },
    cited_by_count: { type: "integer" },
    authors: { type: "array", items: authorSchema },
    publication_date: { type: "string" },
    preferred_fulltext_url: { type: "string" },
  },
  required: ["title", "ids", "authors"],
} as const;

export function pageResultSchema(itemSchema: object) {
  return {
    type: "object",
    properties: {
      data: { type: "array", items: itemSchema },
      total_count: { type: "integer" },
      per_page: { type: "integer" },
      page: { type: "integer" },
      has_next: { type: "boolean" },
    },
    required: ["data", "per_page", "page"],
  } as const;
}

export const listResultSchema = {
  type: "object",
  properties: {
    data: { type: "array", items: { type: "string" } },
    count: { type: "integer" },
  },
  required: ["data"],
} as const;

export const pageProperty = {
  type: "integer",
  minimum: 1,
  default: 1,
  description: "The page number of the results to retrieve (default: 1)",
} as const;

export const openAlexIdDescription = (entity: string, prefix: string) =>
  `An OpenAlex ${entity} ID, e.g. "https://openalex.org/${prefix}123456789"`;
