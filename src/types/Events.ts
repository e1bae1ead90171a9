import type { Evidence, ToolError } from "./ToolResult.js";

/**
 * Event types emitted by ToolRuntime and the scholar adapter.
 */
export type ToolEventType =
  | "TOOL_CALLED"
  | "TOOL_RESULT"
  | "POLICY_DENIED"
  | "RETRY";

/**
 * Base event structure for all tool events.
 */
export interface ToolEvent {
  type: ToolEventType;
  timestamp: string; // ISO 8601
  requestId: string;
  taskId: string;
  toolName: string;
  traceId?: string;
  userId?: string;
}

/**
 * Emitted when a tool is called.
 */
export interface ToolCalledEvent extends ToolEvent {
  type: "TOOL_CALLED";
  argsSummary: string; // Sanitized summary of args
  purpose: string;
  idempotencyKey?: string;
}

/**
 * Emitted when a tool returns a result.
 */
export interface ToolResultEvent extends ToolEvent {
  type: "TOOL_RESULT";
  ok: boolean;
  durationMs: number;
  resultSummary: string;
  evidence: Evidence[];
  error?: ToolError;
}

/**
 * Emitted when policy denies a tool invocation.
 */
export interface PolicyDeniedEvent extends ToolEvent {
  type: "POLICY_DENIED";
  reason: string;
  missingCapabilities?: string[];
}

/**
 * Emitted when the HTTP client schedules another attempt.
 */
export interface RetryEvent extends ToolEvent {
  type: "RETRY";
  attempt: number;
  maxAttempts: number;
  waitSeconds: number;
  reason: string;
}

/**
 * Union type of all tool events.
 */
export type AnyToolEvent =
  | ToolCalledEvent
  | ToolResultEvent
  | PolicyDeniedEvent
  | RetryEvent;
