import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readString } from "../args.js";
import { fetchWorkIdList } from "../pagination.js";
import { listResultSchema } from "../schemas.js";
import { paperIdInputSchema } from "./referencedWorks.js";

export const relatedWorksSpec: ToolSpec = {
  name: "scholar/related_works_of_paper",
  version: "1.0.0",
  kind: "scholar",
  description: "List the OpenAlex ids of works related to a paper",
  tags: ["openalex", "papers", "related"],
  inputSchema: paperIdInputSchema,
  outputSchema: listResultSchema,
  capabilities: ["network"],
  annotations: { readOnlyHint: true, openWorldHint: true },
};

export const relatedWorksHandler: ScholarToolHandler = async (args, ctx) =>
  fetchWorkIdList(ctx, readString(args, "paper_id"), "related_works", "related_works works");
