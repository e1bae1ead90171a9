import type { Capability, ToolSpec } from "../types/ToolSpec.js";
import type { ExecContext } from "../types/ToolIntent.js";

/**
 * Policy configuration for the engine.
 */
export interface PolicyConfig {
  /** Tool names that may never run, whatever the permissions */
  deniedTools?: string[];
}

/**
 * Result of a policy check.
 */
export interface PolicyCheckResult {
  allowed: boolean;
  reason?: string;
  missingCapabilities?: Capability[];
}

/**
 * Capability gate: a call runs only if the context grants every capability
 * the tool declares.
 */
export class PolicyEngine {
  private readonly deniedTools: ReadonlySet<string>;

  constructor(config: PolicyConfig = {}) {
    this.deniedTools = new Set(config.deniedTools ?? []);
  }

  /**
   * Throws PolicyDeniedError if denied.
   */
  enforce(spec: ToolSpec, ctx: ExecContext): void {
    const result = this.check(spec, ctx);
    if (!result.allowed) {
      throw new PolicyDeniedError(
        result.reason ?? "Policy denied",
        result.missingCapabilities,
      );
    }
  }

  check(spec: ToolSpec, ctx: ExecContext): PolicyCheckResult {
    if (this.deniedTools.has(spec.name)) {
      return { allowed: false, reason: `Tool denied by policy: ${spec.name}` };
    }

    const missing = spec.capabilities.filter((cap) => !ctx.permissions.includes(cap));
    if (missing.length > 0) {
      return {
        allowed: false,
        reason: `Missing capabilities: ${missing.join(", ")}`,
        missingCapabilities: missing,
      };
    }

    return { allowed: true };
  }
}

/**
 * Error thrown when policy denies execution.
 */
export class PolicyDeniedError extends Error {
  public readonly kind = "POLICY_DENIED";

  constructor(
    message: string,
    public readonly missingCapabilities?: Capability[],
  ) {
    super(message);
    this.name = "PolicyDeniedError";
  }
}
