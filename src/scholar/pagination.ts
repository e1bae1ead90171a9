import { createTaggedError, isTaggedError } from "../core/Retry.js";
import { NOT_FOUND, withRequestClient } from "../http/RequestClient.js";
import { asArray, asInteger, asRecord, type JsonRecord } from "./json.js";
import { toList } from "./records.js";
import { openAlexClientOptions } from "./clients.js";
import type { ScholarToolContext, ScholarToolResult } from "./types.js";

export interface PageResult<T> {
  data: T[];
  total_count?: number;
  per_page: number;
  page: number;
  has_next?: boolean;
}

export interface ListResult {
  data: string[];
  count?: number;
}

/**
 * `has_next` is only present (and true) when results remain past this page.
 */
export function buildPageResult<T>(
  data: T[],
  totalCount: number | undefined,
  perPage: number,
  page: number,
): PageResult<T> {
  const result: PageResult<T> = { data, per_page: perPage, page };
  if (totalCount !== undefined) result.total_count = totalCount;
  if (totalCount && totalCount > perPage * page) result.has_next = true;
  return result;
}

export interface SearchRequest<T> {
  path: string;
  filter: string;
  sortBy: string;
  page: number;
  /** Log line for the start of the search */
  describe: string;
  notFoundMessage: string;
  foundMessage: (count: number) => string;
  map: (json: JsonRecord) => T;
}

/**
 * Run one paged OpenAlex list query and shape it as a {@link PageResult}.
 *
 * @throws TaggedError `NOT_FOUND` when the page is empty
 */
export async function searchPage<T>(
  ctx: ScholarToolContext,
  request: SearchRequest<T>,
): Promise<ScholarToolResult> {
  const perPage = ctx.config.openalex.perPage;
  const params = {
    filter: request.filter,
    sort: `${request.sortBy}:desc`,
    page: request.page,
    per_page: perPage,
  };

  ctx.logger.info(request.describe);

  return logFailures(ctx, async () => {
    const body = await withRequestClient(
      openAlexClientOptions(ctx),
      (client) => client.get(request.path, params),
      ctx.createClient,
    );

    const record = body === NOT_FOUND ? undefined : asRecord(body);
    const results = asArray(record?.results);
    if (!record || results.length === 0) {
      ctx.logger.info(request.notFoundMessage);
      throw createTaggedError("NOT_FOUND", request.notFoundMessage, { path: request.path });
    }

    const data = toList(results, request.map);
    ctx.logger.info(request.foundMessage(data.length));

    const totalCount = asInteger(asRecord(record.meta)?.count);
    return {
      result: buildPageResult(data, totalCount, perPage, request.page),
      evidence: [
        {
          type: "url",
          ref: `${ctx.config.openalex.baseUrl}${request.path}`,
          summary: `GET ${request.path} page ${request.page}: ${data.length} of ${totalCount ?? "?"} results`,
          createdAt: new Date().toISOString(),
        },
      ],
    };
  });
}

/**
 * Read one of the id lists (`referenced_works`, `related_works`) of a work.
 */
export async function fetchWorkIdList(
  ctx: ScholarToolContext,
  paperId: string,
  field: "referenced_works" | "related_works",
  label: string,
): Promise<ScholarToolResult> {
  const path = `/works/${paperId}`;
  ctx.logger.info(`Fetching ${label} for paper_id=${paperId}`);

  return logFailures(ctx, async () => {
    const body = await withRequestClient(
      openAlexClientOptions(ctx),
      (client) => client.get(path),
      ctx.createClient,
    );

    const record = body === NOT_FOUND ? undefined : asRecord(body);
    const ids = asArray(record?.[field]).filter((id): id is string => typeof id === "string");
    if (ids.length === 0) {
      const message = `No ${label} found for paper_id=${paperId}.`;
      ctx.logger.info(message);
      throw createTaggedError("NOT_FOUND", message, { paperId });
    }

    ctx.logger.info(`Retrieved ${ids.length} ${label} for paper_id=${paperId}.`);
    const result: ListResult = { data: ids, count: ids.length };
    return {
      result,
      evidence: [
        {
          type: "url",
          ref: `${ctx.config.openalex.baseUrl}${path}`,
          summary: `GET ${path}: ${ids.length} ${field}`,
          createdAt: new Date().toISOString(),
        },
      ],
    };
  });
}

/**
 * Log transport failures at error level; empty results are already logged.
 */
export async function logFailures<T>(ctx: ScholarToolContext, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (!isTaggedError(err) || (err.kind !== "NOT_FOUND" && err.kind !== "EMPTY_CONTENT")) {
      ctx.logger.error(err instanceof Error ? err.message : String(err));
    }
    throw err;
  }
}
