import pTimeout, { TimeoutError } from "p-timeout";
import type { ToolAdapter, ToolSpec } from "../types/ToolSpec.js";
import type { ExecContext } from "../types/ToolIntent.js";
import { SchemaValidator, SchemaValidationError } from "./SchemaValidator.js";
import { PolicyEngine, PolicyDeniedError } from "./PolicyEngine.js";
import { BudgetManager } from "./Budget.js";
import { createTaggedError } from "./Retry.js";
import type { PolicyDeniedEvent } from "../types/Events.js";
import { EventLog } from "../observability/EventLog.js";
import { Metrics } from "../observability/Metrics.js";
import { Tracing } from "../observability/Tracing.js";
import type { Logger } from "../observability/Logger.js";

export interface PipelineDependencies {
  registry: { get(name: string): ToolSpec | undefined; list(): string[] };
  adapters: Map<string, ToolAdapter>;
  validator: SchemaValidator;
  policy: PolicyEngine;
  budget: BudgetManager;
  eventLog: EventLog;
  metrics: Metrics;
  tracing: Tracing;
  logger: Logger;
}

/**
 * Pipeline step: Resolve tool from registry.
 */
export function resolveTool(
  toolName: string,
  registry: PipelineDependencies["registry"],
): ToolSpec {
  const spec = registry.get(toolName);
  if (!spec) {
    throw createTaggedError(
      "TOOL_NOT_FOUND",
      `Tool not found: ${toolName}`,
      { availableTools: registry.list().slice(0, 20) },
    );
  }
  return spec;
}

/**
 * Pipeline step: validate input, coercing types and filling schema defaults.
 */
export function validateInput(
  spec: ToolSpec,
  args: unknown,
  validator: SchemaValidator,
): unknown {
  try {
    return validator.validateOrThrow(
      spec.inputSchema,
      args ?? {},
      `Input validation failed for ${spec.name}`,
    );
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw createTaggedError("INPUT_SCHEMA_INVALID", error.message, {
        errors: error.errors,
      });
    }
    throw error;
  }
}

/**
 * Pipeline step: Enforce policy checks.
 */
export function enforcePolicy(
  spec: ToolSpec,
  ctx: ExecContext,
  deps: Pick<PipelineDependencies, "policy" | "eventLog" | "metrics">,
): void {
  try {
    deps.policy.enforce(spec, ctx);
  } catch (error) {
    if (error instanceof PolicyDeniedError) {
      const event: PolicyDeniedEvent = {
        type: "POLICY_DENIED",
        timestamp: new Date().toISOString(),
        requestId: ctx.requestId,
        taskId: ctx.taskId,
        toolName: spec.name,
        traceId: ctx.traceId,
        userId: ctx.userId,
        reason: error.message,
        missingCapabilities: error.missingCapabilities,
      };
      deps.eventLog.append(event);
      deps.metrics.recordPolicyDenied(spec.name);
    }
    throw error;
  }
}

/**
 * Pipeline step: execute inside the tool's budget and under its timeout.
 * Transport retries happen inside the HTTP client, not here.
 */
export async function executeWithBudget(
  spec: ToolSpec,
  args: unknown,
  ctx: ExecContext,
  spanId: string,
  deps: PipelineDependencies,
): Promise<{ result: unknown; raw?: unknown }> {
  const adapter = deps.adapters.get(spec.kind);
  if (!adapter) {
    throw createTaggedError(
      "TOOL_NOT_FOUND",
      `No adapter registered for kind: ${spec.kind}`,
    );
  }

  const timeoutMs = deps.budget.getTimeout(spec.name, ctx.budget?.timeoutMs);
  const timeoutError = createTaggedError(
    "TIMEOUT",
    `Tool ${spec.name} timed out after ${timeoutMs}ms`,
    { timeoutMs },
  );
  // Aborting stops the adapter's HTTP retries, so the bulkhead slot frees with the result
  const controller = new AbortController();
  const execCtx: ExecContext = { ...ctx, signal: controller.signal };

  const run = deps.budget.execute(spec.name, async () => {
    deps.tracing.addEvent(spanId, "execute_start");
    deps.logger.trace("execute.start", {
      tool: spec.name,
      requestId: ctx.requestId,
      timeoutMs,
    });
    const result = await adapter.invoke(spec, args, execCtx);
    deps.tracing.addEvent(spanId, "execute_end");
    deps.logger.trace("execute.end", {
      tool: spec.name,
      requestId: ctx.requestId,
    });
    return result;
  });

  try {
    return await pTimeout(run, { milliseconds: timeoutMs, message: timeoutError.message });
  } catch (error) {
    if (error instanceof TimeoutError) {
      controller.abort(timeoutError);
      throw timeoutError;
    }
    throw error;
  }
}

/**
 * Pipeline step: Validate output against schema.
 */
export function validateOutput(
  spec: ToolSpec,
  result: unknown,
  validator: SchemaValidator,
): unknown {
  try {
    return validator.validateOrThrow(
      spec.outputSchema,
      result,
      `Output validation failed for ${spec.name}`,
    );
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw createTaggedError("OUTPUT_SCHEMA_INVALID", error.message, {
        errors: error.errors,
      });
    }
    throw error;
  }
}
