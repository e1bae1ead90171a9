import {
  bulkhead,
  circuitBreaker,
  BrokenCircuitError,
  BulkheadRejectedError,
  ConsecutiveBreaker,
  handleWhen,
  type CircuitBreakerPolicy,
  type BulkheadPolicy,
} from "cockatiel";
import { createTaggedError, isTaggedError } from "./Retry.js";

/**
 * Budget configuration for a tool or global scope.
 */
export interface BudgetOptions {
  /** Default timeout in ms for tool invocations */
  defaultTimeoutMs?: number;
  /** Per-tool timeout overrides, keyed by tool name */
  toolTimeoutsMs?: Record<string, number>;
  /** Max concurrent invocations per tool */
  maxConcurrency?: number;
  /** Rate limit: max calls per window */
  rateLimit?: { maxCalls: number; windowMs: number };
  /** Circuit breaker config; only upstream failures count, not empty results or bad input */
  circuitBreaker?: {
    /** Number of consecutive failures before opening */
    threshold: number;
    /** Half-open reset time in ms */
    halfOpenAfterMs: number;
  };
}

/**
 * Per-tool rate limiter using sliding window.
 */
class RateLimiter {
  private readonly timestamps: number[] = [];

  constructor(
    private readonly maxCalls: number,
    private readonly windowMs: number,
    private readonly now: () => number,
  ) {}

  tryAcquire(): boolean {
    const now = this.now();
    let oldest = this.timestamps[0];
    while (oldest !== undefined && oldest <= now - this.windowMs) {
      this.timestamps.shift();
      oldest = this.timestamps[0];
    }
    if (this.timestamps.length >= this.maxCalls) {
      return false;
    }
    this.timestamps.push(now);
    return true;
  }
}

const UPSTREAM_KINDS = new Set(["HTTP_NETWORK", "HTTP_TIMEOUT", "UPSTREAM_ERROR"]);

// A 4xx other than 408/429 is the caller's request, not the upstream's health
function isUpstreamFailure(error: Error): boolean {
  if (!isTaggedError(error)) return true;
  if (error.kind === "HTTP_STATUS") {
    const status = statusOf(error.details);
    return status === undefined || status >= 500 || status === 408 || status === 429;
  }
  return UPSTREAM_KINDS.has(error.kind);
}

function statusOf(details: unknown): number | undefined {
  if (typeof details !== "object" || details === null || !("status" in details)) return undefined;
  return typeof details.status === "number" ? details.status : undefined;
}

/**
 * Per-tool timeout, rate limit, concurrency limit and circuit breaker.
 */
export class BudgetManager {
  private readonly defaultTimeoutMs: number;
  private readonly bulkheads = new Map<string, BulkheadPolicy>();
  private readonly circuitBreakers = new Map<string, CircuitBreakerPolicy>();
  private readonly rateLimiters = new Map<string, RateLimiter>();
  private readonly options: BudgetOptions;
  private readonly now: () => number;

  constructor(options: BudgetOptions = {}, now: () => number = Date.now) {
    this.options = options;
    this.now = now;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 60_000;
  }

  /**
   * Get effective timeout for a tool invocation.
   */
  getTimeout(toolName: string, contextTimeoutMs?: number): number {
    return contextTimeoutMs ?? this.options.toolTimeoutsMs?.[toolName] ?? this.defaultTimeoutMs;
  }

  /**
   * Check rate limit for a tool. Returns true if allowed.
   */
  checkRateLimit(toolName: string): boolean {
    if (!this.options.rateLimit) return true;
    let limiter = this.rateLimiters.get(toolName);
    if (!limiter) {
      limiter = new RateLimiter(
        this.options.rateLimit.maxCalls,
        this.options.rateLimit.windowMs,
        this.now,
      );
      this.rateLimiters.set(toolName, limiter);
    }
    return limiter.tryAcquire();
  }

  /**
   * Get or create a bulkhead (concurrency limiter) for a tool.
   */
  getBulkhead(toolName: string): BulkheadPolicy | undefined {
    if (!this.options.maxConcurrency) return undefined;
    let bh = this.bulkheads.get(toolName);
    if (!bh) {
      bh = bulkhead(this.options.maxConcurrency, 0);
      this.bulkheads.set(toolName, bh);
    }
    return bh;
  }

  /**
   * Get or create a circuit breaker for a tool.
   */
  getCircuitBreaker(toolName: string): CircuitBreakerPolicy | undefined {
    if (!this.options.circuitBreaker) return undefined;
    let breaker = this.circuitBreakers.get(toolName);
    if (!breaker) {
      breaker = circuitBreaker(handleWhen(isUpstreamFailure), {
        breaker: new ConsecutiveBreaker(this.options.circuitBreaker.threshold),
        halfOpenAfter: this.options.circuitBreaker.halfOpenAfterMs,
      });
      this.circuitBreakers.set(toolName, breaker);
    }
    return breaker;
  }

  /**
   * Execute a function within the tool's bulkhead and circuit breaker.
   *
   * @throws TaggedError `BUDGET_EXCEEDED` when the bulkhead is full or the circuit is open
   */
  async execute<T>(toolName: string, fn: () => Promise<T>): Promise<T> {
    const bh = this.getBulkhead(toolName);
    const breaker = this.getCircuitBreaker(toolName);

    let wrapped: () => Promise<T> = fn;

    if (breaker) {
      const prevWrapped = wrapped;
      wrapped = () => breaker.execute(() => prevWrapped());
    }

    if (bh) {
      const prevWrapped = wrapped;
      wrapped = () => bh.execute(() => prevWrapped());
    }

    try {
      return await wrapped();
    } catch (error) {
      if (error instanceof BulkheadRejectedError) {
        throw createTaggedError("BUDGET_EXCEEDED", `Too many concurrent calls to ${toolName}`);
      }
      if (error instanceof BrokenCircuitError) {
        throw createTaggedError(
          "BUDGET_EXCEEDED",
          `Circuit open for ${toolName} after repeated upstream failures`,
        );
      }
      throw error;
    }
  }
}
