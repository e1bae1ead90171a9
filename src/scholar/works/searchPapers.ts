import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readChoice, readInteger, readOptionalString, readString } from "../args.js";
import { sanitizeSearchText } from "../sanitize.js";
import { searchPage } from "../pagination.js";
import { toWork } from "../records.js";
import { openAlexIdDescription, pageProperty, pageResultSchema, workSchema } from "../schemas.js";

const SEARCH_FIELDS = ["default", "title", "title_and_abstract"] as const;
const SORT_FIELDS = ["relevance_score", "cited_by_count", "publication_date"] as const;

export const searchPapersInputSchema = {
  type: "object",
  properties: {
    query: {
      type: "string",
      minLength: 1,
      description: "The search term or keywords to look for in the papers",
    },
    search_by: {
      type: "string",
      enum: SEARCH_FIELDS,
      default: "default",
      description: "The field to search in",
    },
    sort_by: {
      type: "string",
      enum: SORT_FIELDS,
      default: "relevance_score",
      description: "The sorting criteria",
    },
    institution_name: {
      type: "string",
      description: "Optional institution or affiliation name to filter results",
    },
    author_id: {
      type: "string",
      description: `Optional author filter. ${openAlexIdDescription("Author", "A")}`,
    },
    page: pageProperty,
  },
  required: ["query"],
  additionalProperties: false,
} as const;

export const searchPapersSpec: ToolSpec = {
  name: "scholar/search_papers",
  version: "1.0.0",
  kind: "scholar",
  description: "Search academic papers on OpenAlex by keywords, optionally filtered by institution or author",
  tags: ["openalex", "papers", "search"],
  inputSchema: searchPapersInputSchema,
  outputSchema: pageResultSchema(workSchema),
  capabilities: ["network"],
  annotations: { readOnlyHint: true, openWorldHint: true },
};

export const searchPapersHandler: ScholarToolHandler = async (args, ctx) => {
  const query = sanitizeSearchText(readString(args, "query"));
  const searchBy = readChoice(args, "search_by", SEARCH_FIELDS, "default");
  const sortBy = readChoice(args, "sort_by", SORT_FIELDS, "relevance_score");
  const institutionName = sanitizeSearchText(readOptionalString(args, "institution_name"));
  const authorId = readOptionalString(args, "author_id");
  const page = readInteger(args, "page", 1);

  let filter = `${searchBy}.search:"${query}"`;
  if (institutionName) filter += `,raw_affiliation_strings.search:"${institutionName}"`;
  if (authorId) filter += `,authorships.author.id:${authorId}`;

  return searchPage(ctx, {
    path: "/works",
    filter,
    sortBy,
    page,
    describe: `Searching for papers using: query=${query}, search_by=${searchBy}, sort_by=${sortBy}, page=${page}`,
    notFoundMessage: "No works found with the query.",
    foundMessage: (count) => `Found ${count} papers.`,
    map: toWork,
  });
};
