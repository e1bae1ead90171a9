import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readChoice, readInteger, readString } from "../args.js";
import { searchPage } from "../pagination.js";
import { toWork } from "../records.js";
import { openAlexIdDescription, pageProperty, pageResultSchema, workSchema } from "../schemas.js";

const SORT_FIELDS = ["cited_by_count", "publication_date"] as const;

export const papersByAuthorInputSchema = {
  type: "object",
  properties: {
    author_id: {
      type: "string",
      minLength: 1,
      description: openAlexIdDescription("Author", "A"),
    },
    sort_by: {
      type: "string",
      enum: SORT_FIELDS,
      default: "cited_by_count",
    },
    page: pageProperty,
  },
  required: ["author_id"],
  additionalProperties: false,
} as const;

export const papersByAuthorSpec: ToolSpec = {
  name: "scholar/papers_by_author",
  version: "1.0.0",
  kind: "scholar",
  description: "List papers written by an OpenAlex author",
  tags: ["openalex", "papers", "authors"],
  inputSchema: papersByAuthorInputSchema,
  outputSchema: pageResultSchema(workSchema),
  capabilities: ["network"],
  annotations: { readOnlyHint: true, openWorldHint: true },
};

export const papersByAuthorHandler: ScholarToolHandler = async (args, ctx) => {
  const authorId = readString(args, "author_id");
  const sortBy = readChoice(args, "sort_by", SORT_FIELDS, "cited_by_count");
  const page = readInteger(args, "page", 1);

  return searchPage(ctx, {
    path: "/works",
    filter: `authorships.author.id:${authorId}`,
    sortBy,
    page,
    describe: `Searching for papers using: author_id=${authorId}, sort_by=${sortBy}, page=${page}`,
    notFoundMessage: `No works found for author_id=${authorId}.`,
    foundMessage: (count) => `Found ${count} papers by author_id=${authorId}.`,
    map: toWork,
  });
};
