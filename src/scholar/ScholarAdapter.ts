import type { ToolAdapter, ToolSpec } from "../types/ToolSpec.js";
import type { ExecContext } from "../types/ToolIntent.js";
import type { RetryInfo } from "../core/Retry.js";
import { RequestClient, type ClientFactory } from "../http/RequestClient.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import type { LookupFn } from "../security/urlGuard.js";
import type { ScholarToolContext, ScholarToolHandler, ScholarToolsConfig } from "./types.js";

export interface ScholarAdapterOptions {
  config: ScholarToolsConfig;
  logger?: Logger;
  createClient?: ClientFactory;
  lookup?: LookupFn;
  /** Called for every retry the HTTP client schedules during an invocation */
  onRetry?: (info: RetryInfo, spec: ToolSpec, ctx: ExecContext) => void;
}

/**
 * Adapter for scholar tools (kind="scholar").
 * Dispatches to registered handler functions by tool name.
 */
export class ScholarAdapter implements ToolAdapter {
  readonly kind = "scholar" as const;
  private readonly handlers = new Map<string, ScholarToolHandler>();
  private readonly config: ScholarToolsConfig;
  private readonly logger: Logger;
  private readonly createClient: ClientFactory;
  private readonly lookup?: LookupFn;
  private readonly onRetry?: ScholarAdapterOptions["onRetry"];

  constructor(options: ScholarAdapterOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger({ prefix: "scholar-tools" });
    this.createClient = options.createClient ?? ((opts) => new RequestClient(opts));
    this.lookup = options.lookup;
    this.onRetry = options.onRetry;
  }

  registerHandler(toolName: string, handler: ScholarToolHandler): void {
    this.handlers.set(toolName, handler);
  }

  getRegisteredTools(): string[] {
    return Array.from(this.handlers.keys());
  }

  async invoke(
    spec: ToolSpec,
    args: unknown,
    ctx: ExecContext,
  ): Promise<{ result: unknown; raw?: unknown }> {
    const handler = this.handlers.get(spec.name);
    if (!handler) {
      throw new Error(
        `Scholar tool handler not found: ${spec.name}. Available: [${this.getRegisteredTools().join(", ")}]`,
      );
    }

    const onRetry = this.onRetry;
    const toolCtx: ScholarToolContext = {
      execCtx: ctx,
      config: this.config,
      createClient: this.createClient,
      logger: this.logger,
      lookup: this.lookup,
      onRetry: onRetry ? (info) => onRetry(info, spec, ctx) : undefined,
    };

    const output = await handler(isArgsRecord(args) ? args : {}, toolCtx);

    return {
      result: output.result,
      raw: { evidence: output.evidence },
    };
  }
}

function isArgsRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
