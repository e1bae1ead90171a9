import { randomUUID } from "node:crypto";
import type { Capability, ToolSpec } from "../types/ToolSpec.js";
import type { BudgetConfig, ExecContext, ToolIntent } from "../types/ToolIntent.js";
import type { ToolResult } from "../types/ToolResult.js";
import type { RetryEvent } from "../types/Events.js";
import type { RetryInfo } from "../core/Retry.js";
import { ToolRuntime } from "../core/ToolRuntime.js";
import { ToolRegistry } from "../registry/ToolRegistry.js";
import { createLogger } from "../observability/Logger.js";
import type { DebugOptions, Logger } from "../observability/Logger.js";
import type { ClientFactory } from "../http/RequestClient.js";
import type { LookupFn } from "../security/urlGuard.js";
import { registerScholarTools } from "../scholar/ScholarToolsModule.js";
import {
  parseConfig,
  toBudgetOptions,
  toDebugOptions,
  toPermissions,
  toScholarToolsConfig,
  type ScholarConfig,
} from "../config/ScholarConfig.js";

export interface ToolMetadata {
  name: string;
  description: string;
}

export interface ScholarHubOptions {
  /** Validated configuration; defaults apply when omitted */
  config?: ScholarConfig;
  /** Overrides config.debug */
  debug?: DebugOptions;
  /** Injected HTTP client factory (tests) */
  createClient?: ClientFactory;
  /** Injected DNS lookup for the full-text host check (tests) */
  lookup?: LookupFn;
}

export interface InvokeOptions {
  purpose?: string;
  requestId?: string;
  taskId?: string;
  traceId?: string;
  userId?: string;
  /** Defaults to runtime.permissions from the config */
  permissions?: Capability[];
  budget?: BudgetConfig;
  idempotencyKey?: string;
}

/**
 * Wires registry, runtime and the scholar adapter from one configuration.
 * Retries scheduled by the HTTP client surface as RETRY events and
 * `http_retries_total` counts.
 */
export class ScholarHub {
  private readonly registry: ToolRegistry;
  private readonly runtime: ToolRuntime;
  private readonly logger: Logger;
  private readonly config: ScholarConfig;
  private readonly permissions: Capability[];
  private closed = false;

  constructor(options: ScholarHubOptions = {}) {
    this.config = options.config ?? parseConfig({});
    const debug = options.debug ?? toDebugOptions(this.config);
    this.logger = createLogger({ ...debug, prefix: "scholar-tools" });
    this.permissions = toPermissions(this.config);
    this.registry = new ToolRegistry();

    this.runtime = new ToolRuntime({
      registry: this.registry,
      config: {
        budget: toBudgetOptions(this.config),
        debug,
      },
    });

    const adapter = registerScholarTools(this.registry, toScholarToolsConfig(this.config), {
      logger: this.logger,
      createClient: options.createClient,
      lookup: options.lookup,
      onRetry: (info, spec, ctx) => this.recordRetry(info, spec, ctx),
    });
    this.runtime.registerAdapter(adapter);
  }

  listToolMetadata(): ToolMetadata[] {
    return this.registry.snapshot().map((spec) => ({
      name: spec.name,
      description: spec.description ?? "",
    }));
  }

  listTools(): ToolSpec[] {
    return this.registry.snapshot();
  }

  getTool(toolName: string): ToolSpec | undefined {
    return this.registry.get(toolName);
  }

  /**
   * Invoke a tool through the runtime. Never throws; failures come back
   * as `{ ok: false, error }`.
   */
  async invokeTool(
    toolName: string,
    args: unknown,
    options: InvokeOptions = {},
  ): Promise<ToolResult> {
    if (this.closed) {
      return {
        ok: false,
        evidence: [],
        error: { kind: "UPSTREAM_ERROR", message: "Hub has been shut down" },
      };
    }
    const requestId = options.requestId ?? `req_${randomUUID()}`;
    const taskId = options.taskId ?? `task_${randomUUID()}`;

    const intent: ToolIntent = {
      tool: toolName,
      args,
      purpose: options.purpose ?? "scholar-tools.invoke",
      idempotencyKey: options.idempotencyKey ?? `${requestId}:${taskId}:${toolName}`,
    };

    const ctx: ExecContext = {
      requestId,
      taskId,
      traceId: options.traceId,
      userId: options.userId,
      permissions: options.permissions ?? this.permissions,
      budget: options.budget,
    };

    return this.runtime.invoke(intent, ctx);
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  getRuntime(): ToolRuntime {
    return this.runtime;
  }

  getConfig(): ScholarConfig {
    return this.config;
  }

  /** Idempotent. HTTP clients are per-call, so there is nothing left open. */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.logger.debug("hub.shutdown", {
      invocations: this.runtime.getEventLog().query({ type: "TOOL_RESULT" }).length,
    });
  }

  private recordRetry(info: RetryInfo, spec: ToolSpec, ctx: ExecContext): void {
    const event: RetryEvent = {
      type: "RETRY",
      timestamp: new Date().toISOString(),
      requestId: ctx.requestId,
      taskId: ctx.taskId,
      toolName: spec.name,
      traceId: ctx.traceId,
      userId: ctx.userId,
      attempt: info.attempt,
      maxAttempts: info.maxAttempts,
      waitSeconds: info.waitSeconds,
      reason: info.error.message,
    };
    this.runtime.getEventLog().append(event);
    this.runtime
      .getMetrics()
      .recordRetry(spec.name, info.status !== undefined ? String(info.status) : info.error.kind);
  }
}

export function createScholarHub(options: ScholarHubOptions = {}): ScholarHub {
  return new ScholarHub(options);
}
