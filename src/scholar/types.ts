import type { ExecContext } from "../types/ToolIntent.js";
import type { Evidence } from "../types/ToolResult.js";
import type { RetryInfo } from "../core/Retry.js";
import type { ClientFactory } from "../http/RequestClient.js";
import type { Logger } from "../observability/Logger.js";
import type { LookupFn } from "../security/urlGuard.js";

/**
 * Configuration shared by all scholar tool handlers.
 */
export interface ScholarToolsConfig {
  openalex: {
    baseUrl: string;
    /** Sent as the `mailto` query parameter on every OpenAlex call (polite pool) */
    mailto: string;
    perPage: number;
  };
  http: {
    timeoutMs: number;
    /** Total attempts per request */
    maxRetries: number;
    jitterMaxSeconds: number;
    userAgent: string;
  };
  fulltext: {
    proxyBaseUrl: string;
    /** Resolve the target host and reject private addresses before fetching */
    resolveHosts: boolean;
  };
}

export const DEFAULT_MAILTO = "placeholder_email@gmail.com";

export const DEFAULT_SCHOLAR_TOOLS_CONFIG: ScholarToolsConfig = {
  openalex: {
    baseUrl: "https://api.openalex.org",
    mailto: DEFAULT_MAILTO,
    perPage: 10,
  },
  http: {
    timeoutMs: 10_000,
    maxRetries: 3,
    jitterMaxSeconds: 0.25,
    userAgent: "scholar-tools/0.1",
  },
  fulltext: {
    proxyBaseUrl: "https://r.jina.ai",
    resolveHosts: true,
  },
};

/**
 * Context passed to each scholar tool handler.
 */
export interface ScholarToolContext {
  execCtx: ExecContext;
  config: ScholarToolsConfig;
  createClient: ClientFactory;
  logger: Logger;
  onRetry?: (info: RetryInfo) => void;
  /** DNS lookup used by the full-text host check */
  lookup?: LookupFn;
}

export interface ScholarToolResult {
  result: unknown;
  evidence: Evidence[];
}

export type ScholarToolHandler = (
  args: Record<string, unknown>,
  ctx: ScholarToolContext,
) => Promise<ScholarToolResult>;
