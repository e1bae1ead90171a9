import type { Capability } from "./ToolSpec.js";

/**
 * Budget constraints for a tool invocation.
 */
export interface BudgetConfig {
  timeoutMs?: number;
}

/**
 * Execution context for one tool invocation.
 * Contains permissions, budget, and observability context.
 */
export interface ExecContext {
  requestId: string;
  taskId: string;

  /** Allowed capabilities for this invocation */
  permissions: Capability[];
  budget?: BudgetConfig;

  /** OpenTelemetry-compatible trace ID */
  traceId?: string;
  userId?: string;

  /** Set by the runtime for the execute step; aborted when the call times out */
  signal?: AbortSignal;
}

/**
 * Tool invocation intent from the agent host (untrusted input).
 */
export interface ToolIntent {
  /** ToolSpec.name reference */
  tool: string;
  /** Untrusted input arguments */
  args: unknown;
  /** Human-readable purpose for audit trail */
  purpose: string;
  /** Idempotency key: recommended format requestId:taskId:tool */
  idempotencyKey?: string;
}
