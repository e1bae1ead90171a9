import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readChoice, readInteger, readOptionalString, readString } from "../args.js";
import { sanitizeSearchText } from "../sanitize.js";
import { searchPage } from "../pagination.js";
import { toAuthor } from "../records.js";
import { authorSchema, openAlexIdDescription, pageProperty, pageResultSchema } from "../schemas.js";

const SORT_FIELDS = ["relevance_score", "cited_by_count"] as const;

export const searchAuthorsInputSchema = {
  type: "object",
  properties: {
    query: {
      type: "string",
      minLength: 1,
      description: "The name to search for",
    },
    sort_by: {
      type: "string",
      enum: SORT_FIELDS,
      default: "relevance_score",
    },
    institution_id: {
      type: "string",
      description: `Optional institution filter. ${openAlexIdDescription("Institution", "I")}`,
    },
    page: pageProperty,
  },
  required: ["query"],
  additionalProperties: false,
} as const;

export const searchAuthorsSpec: ToolSpec = {
  name: "scholar/search_authors",
  version: "1.0.0",
  kind: "scholar",
  description: "Search authors on OpenAlex by name, optionally within an institution",
  tags: ["openalex", "authors", "search"],
  inputSchema: searchAuthorsInputSchema,
  outputSchema: pageResultSchema(authorSchema),
  capabilities: ["network"],
  annotations: { readOnlyHint: true, openWorldHint: true },
};

export const searchAuthorsHandler: ScholarToolHandler = async (args, ctx) => {
  const query = sanitizeSearchText(readString(args, "query"));
  const sortBy = readChoice(args, "sort_by", SORT_FIELDS, "relevance_score");
  const institutionId = readOptionalString(args, "institution_id");
  const page = readInteger(args, "page", 1);

  let filter = `default.search:"${query}"`;
  if (institutionId) filter += `,affiliations.institution.id:"${institutionId}"`;

  return searchPage(ctx, {
    path: "/authors",
    filter,
    sortBy,
    page,
    describe: `Searching for authors using: query=${query}, sort_by=${sortBy}, page=${page}, institution_id=${institutionId ?? ""}`,
    notFoundMessage: "No authors found with the query.",
    foundMessage: (count) => `Found ${count} authors.`,
    map: toAuthor,
  });
};
