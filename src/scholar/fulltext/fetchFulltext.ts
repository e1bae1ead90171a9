import type { ToolSpec } from "../../types/ToolSpec.js";
import type { ScholarToolHandler } from "../types.js";
import { readString } from "../args.js";
import { createTaggedError } from "../../core/Retry.js";
import { NOT_FOUND, withRequestClient } from "../../http/RequestClient.js";
import { assertResolvesPublic, explainUnsafeUrl } from "../../security/urlGuard.js";
import { fulltextClientOptions } from "../clients.js";
import { logFailures } from "../pagination.js";

export const fetchFulltextInputSchema = {
  type: "object",
  properties: {
    preferred_fulltext_url: {
      type: "string",
      minLength: 1,
      description: "Preferred full-text URL of the paper or work",
    },
  },
  required: ["preferred_fulltext_url"],
  additionalProperties: false,
} as const;

export const fetchFulltextSpec: ToolSpec = {
  name: "scholar/fetch_fulltext",
  version: "1.0.0",
  kind: "scholar",
  description:
    "Retrieve the contents of a paper from its preferred full-text URL as plain text. " +
    "Paywalled or access-restricted content may come back partial, or as an access notice.",
  tags: ["fulltext", "papers", "web"],
  inputSchema: fetchFulltextInputSchema,
  outputSchema: { type: "string" },
  capabilities: ["network", "read:web"],
  annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: true },
};

/**
 * Strip a proxy prefix the caller may already have applied.
 */
export function normalizeFulltextUrl(url: string, proxyBaseUrl: string): string {
  const prefix = proxyBaseUrl.endsWith("/") ? proxyBaseUrl : `${proxyBaseUrl}/`;
  return url.startsWith(prefix) ? url.slice(prefix.length) : url;
}

export const fetchFulltextHandler: ScholarToolHandler = async (args, ctx) => {
  const { proxyBaseUrl, resolveHosts } = ctx.config.fulltext;
  const raw = readString(args, "preferred_fulltext_url");
  const url = normalizeFulltextUrl(raw, proxyBaseUrl);
  if (url !== raw) {
    ctx.logger.debug(`Removed proxy prefix, normalized URL: ${url}`);
  }

  const unsafe = explainUnsafeUrl(url);
  if (unsafe !== undefined) {
    const message = `Invalid or Disallowed URL: ${url}`;
    ctx.logger.error(message, { reason: unsafe });
    throw createTaggedError("HTTP_DISALLOWED_HOST", message, { url, reason: unsafe });
  }

  return logFailures(ctx, async () => {
    if (resolveHosts) {
      await assertResolvesPublic(url, ctx.lookup);
    }

    ctx.logger.info(`Fetching page: url=${url}`);
    const body = await withRequestClient(
      fulltextClientOptions(ctx),
      (client) => client.get(`/${url}`),
      ctx.createClient,
    );

    if (body === null || body === NOT_FOUND || body === "") {
      const message = "Response is empty content. Try again later.";
      ctx.logger.info(message);
      throw createTaggedError("EMPTY_CONTENT", message, { url });
    }

    const text = typeof body === "string" ? body : JSON.stringify(body);
    return {
      result: text,
      evidence: [
        {
          type: "url",
          ref: url,
          summary: `Fetched full text via ${proxyBaseUrl} (${text.length} chars)`,
          createdAt: new Date().toISOString(),
        },
      ],
    };
  });
};
