import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readChoice, readInteger, readString } from "../args.js";
import { searchPage } from "../pagination.js";
import { toWork } from "../records.js";
import { openAlexIdDescription, pageProperty, pageResultSchema, workSchema } from "../schemas.js";

const SORT_FIELDS = ["cited_by_count", "publication_date"] as const;

export const worksCitingPaperInputSchema = {
  type: "object",
  properties: {
    paper_id: {
      type: "string",
      minLength: 1,
      description: openAlexIdDescription("Work", "W"),
    },
    sort_by: {
      type: "string",
      enum: SORT_FIELDS,
      default: "cited_by_count",
    },
    page: pageProperty,
  },
  required: ["paper_id"],
  additionalProperties: false,
} as const;

export const worksCitingPaperSpec: ToolSpec = {
  name: "scholar/works_citing_paper",
  version: "1.0.0",
  kind: "scholar",
  description: "List works that cite a given paper",
  tags: ["openalex", "papers", "citations"],
  inputSchema: worksCitingPaperInputSchema,
  outputSchema: pageResultSchema(workSchema),
  capabilities: ["network"],
  annotations: { readOnlyHint: true, openWorldHint: true },
};

export const worksCitingPaperHandler: ScholarToolHandler = async (args, ctx) => {
  const paperId = readString(args, "paper_id");
  const sortBy = readChoice(args, "sort_by", SORT_FIELDS, "cited_by_count");
  const page = readInteger(args, "page", 1);

  return searchPage(ctx, {
    path: "/works",
    filter: `cites:${paperId}`,
    sortBy,
    page,
    describe: `Searching for works citing paper using: paper_id=${paperId}, sort_by=${sortBy}, page=${page}`,
    notFoundMessage: `No cites found for paper_id=${paperId}.`,
    foundMessage: (count) => `Found ${count} cites to paper_id=${paperId}.`,
    map: toWork,
  });
};
