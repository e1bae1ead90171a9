import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readString } from "../args.js";
import { fetchWorkIdList } from "../pagination.js";
import { listResultSchema, openAlexIdDescription } from "../schemas.js";

export const paperIdInputSchema = {
  type: "object",
  properties: {
    paper_id: {
      type: "string",
      minLength: 1,
      description: openAlexIdDescription("Work", "W"),
    },
  },
  required: ["paper_id"],
  additionalProperties: false,
} as const;

export const referencedWorksSpec: ToolSpec = {
  name: "scholar/referenced_works_in_paper",
  version: "1.0.0",
  kind: "scholar",
  description:
    "List the OpenAlex ids of works referenced by a paper. May be empty when the paper's full text is inaccessible.",
  tags: ["openalex", "papers", "references"],
  inputSchema: paperIdInputSchema,
  outputSchema: listResultSchema,
  capabilities: ["network"],
  annotations: { readOnlyHint: true, openWorldHint: true },
};

export const referencedWorksHandler: ScholarToolHandler = async (args, ctx) =>
  fetchWorkIdList(ctx, readString(args, "paper_id"), "referenced_works", "referenced works");
