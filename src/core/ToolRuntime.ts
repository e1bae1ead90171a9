import type { ToolAdapter, ToolKind } from "../types/ToolSpec.js";
import type { ExecContext, ToolIntent } from "../types/ToolIntent.js";
import type { ToolResult, Evidence } from "../types/ToolResult.js";
import { ToolRegistry } from "../registry/ToolRegistry.js";
import { SchemaValidator } from "./SchemaValidator.js";
import { PolicyEngine } from "./PolicyEngine.js";
import { BudgetManager } from "./Budget.js";
import { buildEvidence } from "./Evidence.js";
import { EventLog } from "../observability/EventLog.js";
import { createLogger, summarizeForLog, sanitizeForLog } from "../observability/Logger.js";
import type { DebugOptions, Logger } from "../observability/Logger.js";
import { Metrics } from "../observability/Metrics.js";
import { Tracing } from "../observability/Tracing.js";
import type { PolicyConfig } from "./PolicyEngine.js";
import type { BudgetOptions } from "./Budget.js";
import { createTaggedError } from "./Retry.js";
import {
  resolveTool,
  validateInput,
  enforcePolicy,
  executeWithBudget,
  validateOutput,
  type PipelineDependencies,
} from "./ToolRuntimePipeline.js";
import {
  emitToolCalled,
  recordSuccess,
  handleError,
  type ObservabilityDependencies,
} from "./ToolRuntimeObservability.js";

export interface ToolRuntimeConfig {
  policy?: PolicyConfig;
  budget?: BudgetOptions;
  /** Include raw adapter output in ToolResult (default: false) */
  includeRaw?: boolean;
  debug?: DebugOptions;
}

/**
 * Execution kernel for tool invocations.
 *
 * Pipeline:
 * 1. Resolve (registry lookup)
 * 2. Input validate (AJV, with coercion and defaults)
 * 3. Policy gate
 * 4. Rate limit
 * 5. Execute (adapter.invoke() inside bulkhead, circuit breaker and timeout)
 * 6. Output validate
 * 7. Evidence
 * 8. Events, metrics, span
 *
 * Never throws to callers; failures come back as `{ ok: false, error }`.
 */
export class ToolRuntime {
  private readonly registry: ToolRegistry;
  private readonly adapters = new Map<string, ToolAdapter>();
  private readonly validator: SchemaValidator;
  private readonly policy: PolicyEngine;
  private readonly budget: BudgetManager;
  private readonly eventLog: EventLog;
  private readonly metrics: Metrics;
  private readonly tracing: Tracing;
  private readonly config: ToolRuntimeConfig;
  private readonly logger: Logger;

  constructor(
    options: {
      registry?: ToolRegistry;
      validator?: SchemaValidator;
      policy?: PolicyEngine;
      budget?: BudgetManager;
      eventLog?: EventLog;
      metrics?: Metrics;
      tracing?: Tracing;
      config?: ToolRuntimeConfig;
    } = {},
  ) {
    this.config = options.config ?? {};
    this.registry = options.registry ?? new ToolRegistry();
    this.validator = options.validator ?? new SchemaValidator();
    this.policy = options.policy ?? new PolicyEngine(this.config.policy);
    this.budget = options.budget ?? new BudgetManager(this.config.budget);
    this.eventLog = options.eventLog ?? new EventLog();
    this.metrics = options.metrics ?? new Metrics();
    this.tracing = options.tracing ?? new Tracing();
    this.logger = createLogger({ ...this.config.debug, prefix: "scholar-tools:runtime" });

    if (this.logger.options.logEvents) {
      this.eventLog.on((entry) => {
        const event = entry.event;
        this.logger.debug("event", {
          seq: entry.seq,
          type: event.type,
          toolName: event.toolName,
          requestId: event.requestId,
          ok: "ok" in event ? event.ok : undefined,
        });
      });
    }
  }

  registerAdapter(adapter: ToolAdapter): void {
    this.adapters.set(adapter.kind, adapter);
  }

  getAdapter(kind: ToolKind): ToolAdapter | undefined {
    return this.adapters.get(kind);
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  getEventLog(): EventLog {
    return this.eventLog;
  }

  getMetrics(): Metrics {
    return this.metrics;
  }

  getTracing(): Tracing {
    return this.tracing;
  }

  /**
   * Invoke a tool through the pipeline. Never throws.
   */
  async invoke(intent: ToolIntent, ctx: ExecContext): Promise<ToolResult> {
    const startTime = Date.now();
    if (this.logger.isEnabled("debug")) {
      this.logger.debug("invoke.start", {
        tool: intent.tool,
        requestId: ctx.requestId,
        traceId: ctx.traceId,
        purpose: intent.purpose,
        args: this.logger.options.includeArgs
          ? sanitizeForLog(intent.args)
          : undefined,
      });
    }
    const span = this.tracing.startSpan({
      name: `tool:${intent.tool}`,
      traceId: ctx.traceId,
      attributes: {
        "tool.name": intent.tool,
        "tool.purpose": intent.purpose,
        requestId: ctx.requestId,
        taskId: ctx.taskId,
      },
    });

    emitToolCalled(intent, ctx, this.getObservabilityDeps());

    try {
      const spec = resolveTool(intent.tool, this.registry);

      this.tracing.addEvent(span.spanId, "resolved", {
        kind: spec.kind,
        version: spec.version,
      });

      const validatedArgs = validateInput(spec, intent.args, this.validator);

      enforcePolicy(spec, ctx, {
        policy: this.policy,
        eventLog: this.eventLog,
        metrics: this.metrics,
      });

      if (!this.budget.checkRateLimit(spec.name)) {
        throw createTaggedError(
          "BUDGET_EXCEEDED",
          `Rate limit exceeded for tool: ${spec.name}`,
        );
      }

      const { result, raw } = await executeWithBudget(
        spec,
        validatedArgs,
        ctx,
        span.spanId,
        this.getPipelineDeps(),
      );

      const validatedOutput = validateOutput(spec, result, this.validator);

      // Adapter evidence (e.g. the URL fetched) first, then the runtime's own.
      const durationMs = Date.now() - startTime;
      const evidence = [
        ...adapterEvidence(raw),
        ...buildEvidence({
          spec,
          args: validatedArgs,
          result: validatedOutput,
          ctx,
          durationMs,
        }),
      ];

      recordSuccess(
        spec,
        validatedOutput,
        ctx,
        durationMs,
        evidence,
        span.spanId,
        this.getObservabilityDeps(),
      );

      if (this.logger.isEnabled("debug")) {
        this.logger.debug("invoke.ok", {
          tool: spec.name,
          durationMs,
          result: this.logger.options.includeResults
            ? summarizeForLog(validatedOutput)
            : undefined,
        });
      }

      return {
        ok: true,
        result: validatedOutput,
        evidence,
        raw: this.config.includeRaw ? raw : undefined,
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      return handleError(error, intent, ctx, durationMs, span.spanId, this.getObservabilityDeps());
    }
  }

  private getPipelineDeps(): PipelineDependencies {
    return {
      registry: this.registry,
      adapters: this.adapters,
      validator: this.validator,
      policy: this.policy,
      budget: this.budget,
      eventLog: this.eventLog,
      metrics: this.metrics,
      tracing: this.tracing,
      logger: this.logger,
    };
  }

  private getObservabilityDeps(): ObservabilityDependencies {
    return {
      eventLog: this.eventLog,
      metrics: this.metrics,
      tracing: this.tracing,
      logger: this.logger,
    };
  }
}

function adapterEvidence(raw: unknown): Evidence[] {
  if (!raw || typeof raw !== "object" || !("evidence" in raw)) return [];
  const { evidence } = raw;
  return Array.isArray(evidence) ? evidence.filter(isEvidence) : [];
}

function isEvidence(value: unknown): value is Evidence {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    "ref" in value &&
    "summary" in value &&
    "createdAt" in value &&
    typeof value.ref === "string" &&
    typeof value.summary === "string"
  );
}
