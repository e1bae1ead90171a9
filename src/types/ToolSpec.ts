import type { ExecContext } from "./ToolIntent.js";

/**
 * Tool kinds served by this package.
 */
export type ToolKind = "scholar";

/**
 * Capability declarations for tools.
 * Used by PolicyEngine for permission gating.
 */
export type Capability = "read:web" | "network";

/**
 * Cost hints for tools, used by Budget and routing.
 */
export interface CostHints {
  latencyMsP50?: number;
  latencyMsP95?: number;
}

/**
 * Tool specification as registered with the ToolRegistry and listed to agents.
 */
export interface ToolSpec {
  /** Globally unique name, recommended format: namespace/name */
  name: string;
  /** Semver version */
  version: string;
  /** Tool kind determines which adapter handles execution */
  kind: ToolKind;

  description?: string;
  tags?: string[];

  /** JSON Schema for input validation */
  inputSchema: object;
  /** JSON Schema for output validation */
  outputSchema: object;

  /** Required capabilities for this tool */
  capabilities: Capability[];
  costHints?: CostHints;

  /** Hints forwarded to MCP clients */
  annotations?: {
    readOnlyHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/**
 * Adapter interface: executes tools of one kind.
 */
export interface ToolAdapter {
  kind: ToolKind;
  /** Execute the tool with validated args */
  invoke(
    spec: ToolSpec,
    args: unknown,
    ctx: ExecContext,
  ): Promise<{ result: unknown; raw?: unknown }>;
}
