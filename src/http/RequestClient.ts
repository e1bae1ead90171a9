import { Agent, fetch as undiciFetch, type Dispatcher } from "undici";
import {
  abortError,
  createTaggedError,
  runWithRetry,
  sleepMs,
  type AttemptOutcome,
  type RetryInfo,
} from "../core/Retry.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import { parseRetryAfter } from "./retryAfter.js";
import {
  applyParams,
  mergeParams,
  toQueryParams,
  type ParamMapping,
  type ParamsInput,
} from "./params.js";

/** Returned by {@link RequestClient.get} for a 404 when `notFoundAsEmpty` is set. */
export const NOT_FOUND: unique symbol = Symbol("scholar-tools.not-found");
export type NotFound = typeof NOT_FOUND;

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 425, 429, 500, 502, 503, 504]);

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Parsed JSON body, raw text when the body is not JSON, or null for 204. */
export type ResponseBody = JsonValue;

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface FetchResponse {
  status: number;
  headers: { get(name: string): string | null };
  /** Cancelled when the body is not read, so the pooled connection is freed */
  body?: { cancel(): Promise<void> } | null;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Pooled connection resource owned by one client.
 */
export interface ConnectionHandle {
  dispatcher?: Dispatcher;
  close(): Promise<void>;
}

export interface RequestClientOptions {
  baseUrl: string;
  headers?: Readonly<Record<string, string>>;
  defaultParams?: ParamMapping;
  /** Per-attempt timeout (default: 10000) */
  timeoutMs?: number;
  /** Map 404 to {@link NOT_FOUND} instead of failing (default: false) */
  notFoundAsEmpty?: boolean;
  /** Total attempts including the first (default: 3) */
  maxRetries?: number;
  /** Upper bound of the random jitter added to backoff waits (default: 0.25) */
  jitterMaxSeconds?: number;
  logger?: Logger;
  onRetry?: (info: RetryInfo) => void;
  fetch?: FetchLike;
  createConnection?: () => ConnectionHandle;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  /** Aborts the pending attempt and any retry wait; nothing is retried after it fires */
  signal?: AbortSignal;
}

export type ClientFactory = (options: RequestClientOptions) => RequestClient;

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_JITTER_MAX_SECONDS = 0.25;

function createAgentConnection(): ConnectionHandle {
  const agent = new Agent({
    keepAliveTimeout: 10_000,
    keepAliveMaxTimeout: 60_000,
  });
  return {
    dispatcher: agent,
    close: () => agent.close(),
  };
}

/**
 * GET-only HTTP client with retries, Retry-After handling and default parameters.
 *
 * The connection pool is created on first use and released by {@link close};
 * a closed client reopens on its next request.
 */
export class RequestClient {
  readonly baseUrl: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly defaultParams: ParamMapping;
  readonly timeoutMs: number;
  readonly notFoundAsEmpty: boolean;
  readonly maxRetries: number;
  readonly jitterMaxSeconds: number;

  private readonly logger: Logger;
  private readonly onRetry?: (info: RetryInfo) => void;
  private readonly fetchImpl?: FetchLike;
  private readonly createConnection: () => ConnectionHandle;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly signal?: AbortSignal;
  private connection: ConnectionHandle | undefined;

  constructor(options: RequestClientOptions) {
    this.baseUrl = options.baseUrl;
    this.headers = Object.freeze({ ...(options.headers ?? {}) });
    this.defaultParams = Object.freeze({ ...(options.defaultParams ?? {}) });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.notFoundAsEmpty = options.notFoundAsEmpty ?? false;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.jitterMaxSeconds = options.jitterMaxSeconds ?? DEFAULT_JITTER_MAX_SECONDS;
    this.logger = options.logger ?? createLogger({ prefix: "scholar-tools:http" });
    this.onRetry = options.onRetry;
    this.fetchImpl = options.fetch;
    this.createConnection = options.createConnection ?? createAgentConnection;
    this.sleep = options.sleep ?? sleepMs;
    this.random = options.random ?? Math.random;
    this.signal = options.signal;
  }

  get isOpen(): boolean {
    return this.connection !== undefined;
  }

  /**
   * Issue a GET against `baseUrl + path`.
   *
   * @returns the parsed body, `null` for 204, or {@link NOT_FOUND}
   * @throws TaggedError `HTTP_STATUS`, `HTTP_NETWORK`, `HTTP_TIMEOUT` or `HTTP_INVALID_REQUEST`
   */
  async get(
    path: string,
    params?: ParamsInput,
    headers?: Readonly<Record<string, string>>,
  ): Promise<ResponseBody | NotFound> {
    const connection = this.acquire();
    const url = this.buildUrl(path, params);
    const mergedHeaders = { ...this.headers, ...(headers ?? {}) };

    return runWithRetry<ResponseBody | NotFound>(
      (attempt) => this.attempt(url, mergedHeaders, connection, attempt),
      {
        maxAttempts: this.maxRetries,
        jitterMaxSeconds: this.jitterMaxSeconds,
        sleep: this.sleep,
        random: this.random,
        signal: this.signal,
        onRetry: (info) => {
          this.logger.warn("Retrying request", {
            url: redactUrl(url),
            attempt: info.attempt,
            maxAttempts: info.maxAttempts,
            waitSeconds: Number(info.waitSeconds.toFixed(3)),
            status: info.status,
            reason: info.error.message,
          });
          this.onRetry?.(info);
        },
      },
    );
  }

  /**
   * Release the connection pool. Safe to call more than once.
   */
  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.connection = undefined;
    await connection.close();
  }

  private acquire(): ConnectionHandle {
    if (!this.connection) {
      this.connection = this.createConnection();
      this.logger.debug("Opened connection pool", { baseUrl: this.baseUrl });
    }
    return this.connection;
  }

  private buildUrl(path: string, params?: ParamsInput): string {
    const base = this.baseUrl.endsWith("/") ? this.baseUrl.slice(0, -1) : this.baseUrl;
    const suffix = path.startsWith("/") ? path : `/${path}`;
    const merged = mergeParams(
      this.defaultParams,
      params === undefined ? undefined : toQueryParams(params),
    );

    try {
      return applyParams(new URL(`${base}${suffix}`), merged).toString();
    } catch (err) {
      throw createTaggedError(
        "HTTP_INVALID_REQUEST",
        `Invalid request: ${describeError(err)}`,
        { baseUrl: this.baseUrl, path },
      );
    }
  }

  private async attempt(
    url: string,
    headers: Record<string, string>,
    connection: ConnectionHandle,
    attempt: number,
  ): Promise<AttemptOutcome<ResponseBody | NotFound>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const fetchImpl: FetchLike = this.fetchImpl ?? undiciFetch;
    const outer = this.signal;
    const forwardAbort = () => controller.abort();
    outer?.addEventListener("abort", forwardAbort, { once: true });

    this.logger.debug("GET", { url: redactUrl(url), attempt });

    try {
      const response = await fetchImpl(url, {
        method: "GET",
        headers,
        signal: controller.signal,
        dispatcher: connection.dispatcher,
      });
      const { status } = response;

      if (RETRYABLE_STATUSES.has(status)) {
        await this.discardBody(response);
        return {
          type: "retryable",
          status,
          retryAfterSeconds: parseRetryAfter(response.headers.get("retry-after")),
          error: createTaggedError("HTTP_STATUS", `Request failed with status: ${status}`, {
            status,
            url: redactUrl(url),
          }),
        };
      }

      if (status === 404 && this.notFoundAsEmpty) {
        await this.discardBody(response);
        this.logger.debug("Not found", { url: redactUrl(url) });
        return { type: "success", value: NOT_FOUND };
      }

      if (status < 200 || status >= 300) {
        await this.discardBody(response);
        return {
          type: "fatal",
          error: createTaggedError("HTTP_STATUS", `Request failed with status: ${status}`, {
            status,
            url: redactUrl(url),
          }),
        };
      }

      if (status === 204) {
        await this.discardBody(response);
        return { type: "success", value: null };
      }

      const text = await response.text();
      return { type: "success", value: decodeBody(text) };
    } catch (err) {
      if (outer?.aborted) {
        return { type: "fatal", error: abortError(outer) };
      }
      if (controller.signal.aborted) {
        return {
          type: "retryable",
          error: createTaggedError(
            "HTTP_TIMEOUT",
            `Network error: request timed out after ${this.timeoutMs}ms`,
            { url: redactUrl(url), timeoutMs: this.timeoutMs },
          ),
        };
      }
      return {
        type: "retryable",
        error: createTaggedError("HTTP_NETWORK", `Network error: ${describeError(err)}`, {
          url: redactUrl(url),
        }),
      };
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", forwardAbort);
    }
  }

  private async discardBody(response: FetchResponse): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (err) {
      this.logger.debug("Body cancel failed", { reason: describeError(err) });
    }
  }
}

/**
 * Run `fn` with a fresh client and close it on every exit path.
 */
export async function withRequestClient<T>(
  options: RequestClientOptions,
  fn: (client: RequestClient) => Promise<T>,
  factory: ClientFactory = (opts) => new RequestClient(opts),
): Promise<T> {
  const client = factory(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

function decodeBody(text: string): ResponseBody {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message && cause.message !== err.message) {
    return `${err.message} (${cause.message})`;
  }
  return err.message;
}

// mailto is a contact address, keep it out of logs
function redactUrl(url: string): string {
  return url.replace(/([?&]mailto=)[^&]*/g, "$1[REDACTED]");
}
