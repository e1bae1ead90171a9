/**
 * Evidence attached to a tool result for audit trail.
 */
export interface Evidence {
  type: "tool" | "url" | "text" | "metric";
  ref: string;
  summary: string;
  createdAt: string; // ISO 8601
}

/**
 * Error kinds produced by the runtime, the HTTP client and the tool handlers.
 */
export type ToolErrorKind =
  | "TOOL_NOT_FOUND"
  | "INPUT_SCHEMA_INVALID"
  | "POLICY_DENIED"
  | "BUDGET_EXCEEDED"
  | "TIMEOUT"
  | "UPSTREAM_ERROR"
  | "OUTPUT_SCHEMA_INVALID"
  | "HTTP_STATUS"
  | "HTTP_NETWORK"
  | "HTTP_TIMEOUT"
  | "HTTP_INVALID_REQUEST"
  | "HTTP_DISALLOWED_HOST"
  | "NOT_FOUND"
  | "EMPTY_CONTENT";

/**
 * Error information in a tool result.
 */
export interface ToolError {
  kind?: ToolErrorKind;
  message: string;
  details?: unknown;
}

/**
 * Tool result returned to the agent host.
 * Always structured, never throws raw exceptions.
 */
export interface ToolResult {
  ok: boolean;
  result?: unknown;
  evidence: Evidence[];
  error?: ToolError;
  /** Raw response for debugging (can be disabled in production) */
  raw?: unknown;
}
