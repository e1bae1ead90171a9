import type { ToolErrorKind } from "../types/ToolResult.js";

/**
 * Error carrying a `kind` used for classification and for the tool result.
 */
export type TaggedError = Error & { kind: ToolErrorKind; details?: unknown };

/**
 * Create a tagged error with a kind field for classification.
 */
export function createTaggedError(
  kind: ToolErrorKind,
  message: string,
  details?: unknown,
): TaggedError {
  return Object.assign(new Error(message), { kind, details });
}

export function isTaggedError(error: unknown): error is TaggedError {
  return (
    error instanceof Error &&
    "kind" in error &&
    typeof error.kind === "string"
  );
}

/**
 * Result of a single attempt, consumed by {@link runWithRetry}.
 *
 * `retryable` carries the failure that will surface if attempts run out,
 * plus the server-requested wait (seconds) when one was sent.
 */
export type AttemptOutcome<T> =
  | { type: "success"; value: T }
  | { type: "retryable"; error: TaggedError; status?: number; retryAfterSeconds?: number }
  | { type: "fatal"; error: Error };

export interface RetryInfo {
  /** Attempt that just failed (1-based) */
  attempt: number;
  maxAttempts: number;
  waitSeconds: number;
  /** True when the wait came from a Retry-After hint */
  fromRetryAfter: boolean;
  status?: number;
  error: TaggedError;
}

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** First backoff in seconds (default: 0.5) */
  baseDelaySeconds?: number;
  /** Backoff ceiling in seconds, before jitter (default: 8) */
  maxDelaySeconds?: number;
  /** Upper bound of the uniform jitter added to computed waits (default: 0) */
  jitterMaxSeconds?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Uniform [0, 1) source for jitter */
  random?: () => number;
  onRetry?: (info: RetryInfo) => void;
  /** Stops the loop between attempts and cuts a pending wait short */
  signal?: AbortSignal;
}

export const DEFAULT_BASE_DELAY_SECONDS = 0.5;
export const DEFAULT_MAX_DELAY_SECONDS = 8;

/**
 * Exponential backoff for the n-th retry (1-based), before jitter.
 */
export function computeBackoffSeconds(
  retryNumber: number,
  baseDelaySeconds = DEFAULT_BASE_DELAY_SECONDS,
  maxDelaySeconds = DEFAULT_MAX_DELAY_SECONDS,
): number {
  const exponent = Math.max(0, retryNumber - 1);
  return Math.min(maxDelaySeconds, baseDelaySeconds * 2 ** exponent);
}

/**
 * Error to surface for an aborted signal: its reason when that is tagged.
 */
export function abortError(signal: AbortSignal): TaggedError {
  const reason: unknown = signal.reason;
  return isTaggedError(reason) ? reason : createTaggedError("TIMEOUT", "Operation aborted");
}

export function sleepMs(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Drive an attempt function until it succeeds, fails fatally, or runs out of attempts.
 *
 * A `retryable` outcome with `retryAfterSeconds` waits for that long (floored at 0)
 * instead of the computed backoff. When attempts run out, the last retryable
 * error is thrown. An aborted `signal` ends the loop with its reason.
 */
export async function runWithRetry<T>(
  attemptFn: (attempt: number) => Promise<AttemptOutcome<T>>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    baseDelaySeconds = DEFAULT_BASE_DELAY_SECONDS,
    maxDelaySeconds = DEFAULT_MAX_DELAY_SECONDS,
    jitterMaxSeconds = 0,
    sleep = sleepMs,
    random = Math.random,
    onRetry,
    signal,
  } = options;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 3));

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw abortError(signal);
    const outcome = await attemptFn(attempt);

    switch (outcome.type) {
      case "success":
        return outcome.value;
      case "fatal":
        throw outcome.error;
      case "retryable": {
        if (attempt >= maxAttempts) {
          throw outcome.error;
        }
        if (signal?.aborted) throw abortError(signal);
        const fromRetryAfter = outcome.retryAfterSeconds !== undefined;
        const waitSeconds =
          outcome.retryAfterSeconds !== undefined
            ? Math.max(0, outcome.retryAfterSeconds)
            : computeBackoffSeconds(attempt, baseDelaySeconds, maxDelaySeconds) +
              random() * Math.max(0, jitterMaxSeconds);

        onRetry?.({
          attempt,
          maxAttempts,
          waitSeconds,
          fromRetryAfter,
          status: outcome.status,
          error: outcome.error,
        });
        await sleep(waitSeconds * 1000, signal);
      }
    }
  }
}
