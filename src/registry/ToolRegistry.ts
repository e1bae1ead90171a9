import type { ToolSpec } from "../types/ToolSpec.js";

const TOOL_NAME = /^[a-z][a-z0-9_]*\/[a-z][a-z0-9_]*$/;

const REQUIRED_FIELDS = [
  "name",
  "version",
  "kind",
  "inputSchema",
  "outputSchema",
  "capabilities",
] as const;

/**
 * Tool specs by name, kept in registration order: `tools/list` and the CLI
 * `list` command show them in that order.
 */
export class ToolRegistry {
  private readonly specs = new Map<string, ToolSpec>();

  /**
   * Add a spec. Registering a name again replaces the spec but keeps its position.
   *
   * @throws Error when a required field is missing or the name is malformed
   */
  register(spec: ToolSpec): void {
    assertValidSpec(spec);
    this.specs.set(spec.name, spec);
  }

  get(name: string): ToolSpec | undefined {
    return this.specs.get(name);
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  list(): string[] {
    return Array.from(this.specs.keys());
  }

  snapshot(): ToolSpec[] {
    return Array.from(this.specs.values());
  }

  get size(): number {
    return this.specs.size;
  }
}

function assertValidSpec(spec: ToolSpec): void {
  const missing = REQUIRED_FIELDS.find((field) => !spec[field]);
  if (missing) {
    throw new Error(`ToolSpec.${missing} is required`);
  }
  if (!TOOL_NAME.test(spec.name)) {
    throw new Error(`ToolSpec.name must look like "namespace/tool_name": ${spec.name}`);
  }
}
