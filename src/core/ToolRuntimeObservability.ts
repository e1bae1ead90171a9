import type { ToolSpec } from "../types/ToolSpec.js";
import type { ExecContext, ToolIntent } from "../types/ToolIntent.js";
import type { Evidence, ToolErrorKind, ToolResult } from "../types/ToolResult.js";
import type {
  ToolCalledEvent,
  ToolResultEvent,
} from "../types/Events.js";
import { EventLog } from "../observability/EventLog.js";
import { Metrics } from "../observability/Metrics.js";
import { Tracing } from "../observability/Tracing.js";
import { sanitizeForLog, summarizeForLog } from "../observability/Logger.js";
import type { Logger } from "../observability/Logger.js";
import { isTaggedError } from "./Retry.js";
import { PolicyDeniedError } from "./PolicyEngine.js";

export interface ObservabilityDependencies {
  eventLog: EventLog;
  metrics: Metrics;
  tracing: Tracing;
  logger: Logger;
}

export function emitToolCalled(
  intent: ToolIntent,
  ctx: ExecContext,
  deps: ObservabilityDependencies,
): void {
  const event: ToolCalledEvent = {
    type: "TOOL_CALLED",
    timestamp: new Date().toISOString(),
    requestId: ctx.requestId,
    taskId: ctx.taskId,
    toolName: intent.tool,
    traceId: ctx.traceId,
    userId: ctx.userId,
    argsSummary: intent.args ? sanitizeForLog(intent.args) : "{}",
    purpose: intent.purpose,
    idempotencyKey: intent.idempotencyKey,
  };
  deps.eventLog.append(event);
}

/**
 * Record a successful invocation: metrics, span and TOOL_RESULT event.
 */
export function recordSuccess(
  spec: ToolSpec,
  result: unknown,
  ctx: ExecContext,
  durationMs: number,
  evidence: Evidence[],
  spanId: string,
  deps: ObservabilityDependencies,
): void {
  deps.metrics.recordInvocation(spec.name, true, durationMs);
  deps.tracing.setAttributes(spanId, {
    "tool.duration_ms": durationMs,
    "tool.ok": true,
  });
  deps.tracing.endSpan(spanId, "ok");

  const event: ToolResultEvent = {
    type: "TOOL_RESULT",
    timestamp: new Date().toISOString(),
    requestId: ctx.requestId,
    taskId: ctx.taskId,
    toolName: spec.name,
    traceId: ctx.traceId,
    userId: ctx.userId,
    ok: true,
    durationMs,
    resultSummary: summarizeForLog(result),
    evidence,
  };
  deps.eventLog.append(event);
}

/**
 * Turn any thrown value into a failed ToolResult, recording it on the way.
 */
export function handleError(
  error: unknown,
  intent: ToolIntent,
  ctx: ExecContext,
  durationMs: number,
  spanId: string,
  deps: ObservabilityDependencies,
): ToolResult {
  const kind = errorKind(error);
  const message = error instanceof Error ? error.message : String(error);
  const details = isTaggedError(error) ? error.details : undefined;

  deps.metrics.recordInvocation(intent.tool, false, durationMs, kind);
  deps.tracing.setAttributes(spanId, {
    "tool.duration_ms": durationMs,
    "tool.ok": false,
    "tool.error_kind": kind,
  });
  deps.tracing.endSpan(spanId, "error");

  const event: ToolResultEvent = {
    type: "TOOL_RESULT",
    timestamp: new Date().toISOString(),
    requestId: ctx.requestId,
    taskId: ctx.taskId,
    toolName: intent.tool,
    traceId: ctx.traceId,
    userId: ctx.userId,
    ok: false,
    durationMs,
    resultSummary: message,
    evidence: [],
    error: { kind, message, details },
  };
  deps.eventLog.append(event);

  // Empty search results are an expected outcome, not a fault.
  const level = kind === "NOT_FOUND" || kind === "EMPTY_CONTENT" ? "info" : "warn";
  deps.logger[level]("invoke.error", {
    tool: intent.tool,
    requestId: ctx.requestId,
    traceId: ctx.traceId,
    kind,
    message,
    durationMs,
    details: deps.logger.options.includeResults
      ? summarizeForLog(details)
      : undefined,
  });

  return {
    ok: false,
    evidence: [],
    error: { kind, message, details },
  };
}

function errorKind(error: unknown): ToolErrorKind {
  if (error instanceof PolicyDeniedError) return "POLICY_DENIED";
  if (isTaggedError(error)) return error.kind;
  return "UPSTREAM_ERROR";
}
