import type { RequestClientOptions } from "../http/RequestClient.js";
import type { ScholarToolContext } from "./types.js";

/**
 * Client options for the OpenAlex API. A 404 reads as "no results".
 */
export function openAlexClientOptions(ctx: ScholarToolContext): RequestClientOptions {
  const { openalex, http } = ctx.config;
  return {
    baseUrl: openalex.baseUrl,
    defaultParams: { mailto: openalex.mailto },
    headers: { "User-Agent": http.userAgent, Accept: "application/json" },
    timeoutMs: http.timeoutMs,
    maxRetries: http.maxRetries,
    jitterMaxSeconds: http.jitterMaxSeconds,
    notFoundAsEmpty: true,
    logger: ctx.logger.child("scholar-tools:openalex"),
    onRetry: ctx.onRetry,
    signal: ctx.execCtx.signal,
  };
}

export function fulltextClientOptions(ctx: ScholarToolContext): RequestClientOptions {
  const { fulltext, http } = ctx.config;
  return {
    baseUrl: fulltext.proxyBaseUrl,
    headers: { "User-Agent": http.userAgent },
    timeoutMs: http.timeoutMs,
    maxRetries: http.maxRetries,
    jitterMaxSeconds: http.jitterMaxSeconds,
    logger: ctx.logger.child("scholar-tools:fulltext"),
    onRetry: ctx.onRetry,
    signal: ctx.execCtx.signal,
  };
}
