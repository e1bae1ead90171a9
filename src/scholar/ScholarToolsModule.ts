import { ScholarAdapter, type ScholarAdapterOptions } from "./ScholarAdapter.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import { DEFAULT_SCHOLAR_TOOLS_CONFIG, type ScholarToolsConfig } from "./types.js";

import { searchPapersSpec, searchPapersHandler } from "./works/searchPapers.js";
import { papersByAuthorSpec, papersByAuthorHandler } from "./works/papersByAuthor.js";
import { worksCitingPaperSpec, worksCitingPaperHandler } from "./works/worksCitingPaper.js";
import { referencedWorksSpec, referencedWorksHandler } from "./works/referencedWorks.js";
import { relatedWorksSpec, relatedWorksHandler } from "./works/relatedWorks.js";
import { searchAuthorsSpec, searchAuthorsHandler } from "./authors/searchAuthors.js";
import { searchInstitutionsSpec, searchInstitutionsHandler } from "./institutions/searchInstitutions.js";
import { fetchFulltextSpec, fetchFulltextHandler } from "./fulltext/fetchFulltext.js";

/**
 * All scholar tools: spec + handler pairs.
 */
export const ALL_SCHOLAR_TOOLS = [
  { spec: searchPapersSpec, handler: searchPapersHandler },
  { spec: searchAuthorsSpec, handler: searchAuthorsHandler },
  { spec: searchInstitutionsSpec, handler: searchInstitutionsHandler },
  { spec: papersByAuthorSpec, handler: papersByAuthorHandler },
  { spec: worksCitingPaperSpec, handler: worksCitingPaperHandler },
  { spec: referencedWorksSpec, handler: referencedWorksHandler },
  { spec: relatedWorksSpec, handler: relatedWorksHandler },
  { spec: fetchFulltextSpec, handler: fetchFulltextHandler },
] as const;

export type ScholarToolsUserConfig = {
  [K in keyof ScholarToolsConfig]?: Partial<ScholarToolsConfig[K]>;
};

export function resolveScholarToolsConfig(user: ScholarToolsUserConfig = {}): ScholarToolsConfig {
  return {
    openalex: { ...DEFAULT_SCHOLAR_TOOLS_CONFIG.openalex, ...user.openalex },
    http: { ...DEFAULT_SCHOLAR_TOOLS_CONFIG.http, ...user.http },
    fulltext: { ...DEFAULT_SCHOLAR_TOOLS_CONFIG.fulltext, ...user.fulltext },
  };
}

/**
 * Register all scholar tools with a ToolRegistry and return the configured adapter.
 *
 * ```ts
 * const registry = new ToolRegistry();
 * const adapter = registerScholarTools(registry, { openalex: { mailto: "me@example.org" } });
 * runtime.registerAdapter(adapter);
 * ```
 */
export function registerScholarTools(
  registry: ToolRegistry,
  userConfig: ScholarToolsUserConfig = {},
  options: Omit<ScholarAdapterOptions, "config"> = {},
): ScholarAdapter {
  const adapter = new ScholarAdapter({ ...options, config: resolveScholarToolsConfig(userConfig) });

  for (const { spec, handler } of ALL_SCHOLAR_TOOLS) {
    registry.register(spec);
    adapter.registerHandler(spec.name, handler);
  }

  return adapter;
}
