import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readChoice, readInteger, readString } from "../args.js";
import { sanitizeSearchText } from "../sanitize.js";
import { searchPage } from "../pagination.js";
import { toInstitution } from "../records.js";
import { institutionSchema, pageProperty, pageResultSchema } from "../schemas.js";

const SORT_FIELDS = ["relevance_score", "cited_by_count"] as const;

export const searchInstitutionsInputSchema = {
  type: "object",
  properties: {
    query: {
      type: "string",
      minLength: 1,
      description: "The institution name to search for",
    },
    sort_by: {
      type: "string",
      enum: SORT_FIELDS,
      default: "relevance_score",
    },
    page: pageProperty,
  },
  required: ["query"],
  additionalProperties: false,
} as const;

export const searchInstitutionsSpec: ToolSpec = {
  name: "scholar/search_institutions",
  version: "1.0.0",
  kind: "scholar",
  description: "Search institutions on OpenAlex by name",
  tags: ["openalex", "institutions", "search"],
  inputSchema: searchInstitutionsInputSchema,
  outputSchema: pageResultSchema(institutionSchema),
  capabilities: ["network"],
  annotations: { readOnlyHint: true, openWorldHint: true },
};

export const searchInstitutionsHandler: ScholarToolHandler = async (args, ctx) => {
  const query = sanitizeSearchText(readString(args, "query"));
  const sortBy = readChoice(args, "sort_by", SORT_FIELDS, "relevance_score");
  const page = readInteger(args, "page", 1);

  return searchPage(ctx, {
    path: "/institutions",
    filter: `default.search:"${query}"`,
    sortBy,
    page,
    describe: `Searching for institutions using: query=${query}, sort_by=${sortBy}, page=${page}`,
    notFoundMessage: "No institutions found with the query.",
    foundMessage: (count) => `Found ${count} institution(s).`,
    map: toInstitution,
  });
};
