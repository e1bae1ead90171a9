import type { ToolSpec } from "../types/ToolSpec.js";
import type { ExecContext } from "../types/ToolIntent.js";
import type { Evidence } from "../types/ToolResult.js";

/**
 * Options for building evidence from a tool invocation.
 */
export interface BuildEvidenceOptions {
  spec: ToolSpec;
  args: unknown;
  result: unknown;
  ctx: ExecContext;
  durationMs?: number;
}

const MAX_URL_EVIDENCE = 10;

/**
 * Build evidence records from a tool invocation result.
 */
export function buildEvidence(options: BuildEvidenceOptions): Evidence[] {
  const { spec, args, result, ctx, durationMs } = options;
  const now = new Date().toISOString();
  const evidence: Evidence[] = [];

  evidence.push({
    type: "tool",
    ref: `${spec.name}@${spec.version}`,
    summary: summarizeToolCall(spec, args, result, durationMs),
    createdAt: now,
  });

  // Full-text links found in the output, so a reviewer can follow up
  if (result && typeof result === "object") {
    for (const url of extractUrls(result)) {
      evidence.push({
        type: "url",
        ref: url,
        summary: `Output URL from ${spec.name}`,
        createdAt: now,
      });
    }
  }

  if (durationMs !== undefined && durationMs > 0) {
    evidence.push({
      type: "metric",
      ref: `latency:${spec.name}`,
      summary: `Completed in ${durationMs}ms (request: ${ctx.requestId})`,
      createdAt: now,
    });
  }

  return evidence;
}

function summarizeToolCall(
  spec: ToolSpec,
  args: unknown,
  result: unknown,
  durationMs?: number,
): string {
  const argKeys =
    args && typeof args === "object" ? Object.keys(args).join(", ") : "none";
  const duration = durationMs ? ` in ${durationMs}ms` : "";
  const resultPreview = summarizeValue(result, 100);
  return `${spec.kind}:${spec.name} called with [${argKeys}]${duration} → ${resultPreview}`;
}

function summarizeValue(value: unknown, maxLen: number): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") {
    return value.length > maxLen ? value.slice(0, maxLen) + "..." : value;
  }
  const str = JSON.stringify(value);
  return str.length > maxLen ? str.slice(0, maxLen) + "..." : str;
}

function extractUrls(obj: object): string[] {
  const urls: string[] = [];
  const walk = (key: string, val: unknown) => {
    if (urls.length >= MAX_URL_EVIDENCE) return;
    if (typeof val === "string") {
      if (key === "preferred_fulltext_url" && /^https?:\/\//i.test(val)) urls.push(val);
    } else if (val && typeof val === "object") {
      for (const [k, v] of Object.entries(val)) {
        walk(k, v);
      }
    }
  };
  walk("", obj);
  return urls;
}
