import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { ScholarHub } from "../hub/ScholarHub.js";
import type { ToolSpec } from "../types/ToolSpec.js";
import { createLogger, type Logger } from "../observability/Logger.js";

export const SERVER_NAME = "scholar-tools";
export const SERVER_VERSION = "0.1.0";

export const SERVER_INSTRUCTIONS = [
  "When retrieving paper content, always use the 'preferred_fulltext_url' field",
  "and access it via the scholar_fetch_fulltext tool for full text retrieval.",
  "Only use other links if 'preferred_fulltext_url' is missing, invalid, or fallback is required.",
].join("\n");

/** MCP tool names may not contain "/". */
export function toMcpToolName(name: string): string {
  return name.replace(/\//g, "_");
}

export interface McpServerOptions {
  name?: string;
  version?: string;
  logger?: Logger;
}

/**
 * Build an MCP server exposing every tool registered on the hub.
 * The caller connects it to a transport.
 */
export function createMcpServer(hub: ScholarHub, options: McpServerOptions = {}): Server {
  const logger = options.logger ?? createLogger({ prefix: "scholar-tools:mcp" });
  const server = new Server(
    { name: options.name ?? SERVER_NAME, version: options.version ?? SERVER_VERSION },
    { capabilities: { tools: {} }, instructions: SERVER_INSTRUCTIONS },
  );

  const resolveName = (mcpName: string): string => {
    const spec = hub.listTools().find((s) => toMcpToolName(s.name) === mcpName);
    return spec?.name ?? mcpName;
  };

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: hub.listTools().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const toolName = resolveName(request.params.name);
    logger.debug("tools.call", { tool: toolName });

    const result = await hub.invokeTool(toolName, request.params.arguments ?? {}, {
      purpose: "mcp.tools/call",
    });

    if (!result.ok) {
      return {
        content: [{ type: "text", text: result.error?.message ?? "Tool invocation failed" }],
        isError: true,
      };
    }
    return {
      content: [{ type: "text", text: renderResult(result.result) }],
    };
  });

  server.onerror = (error) => {
    logger.error("server.error", { message: error.message });
  };

  return server;
}

/**
 * Serve the hub over stdio. Resolves once the transport closes.
 */
export async function serveStdio(hub: ScholarHub, options: McpServerOptions = {}): Promise<void> {
  const logger = options.logger ?? createLogger({ prefix: "scholar-tools:mcp" });
  const server = createMcpServer(hub, { ...options, logger });
  const transport = new StdioServerTransport();
  const closed = new Promise<void>((resolve) => {
    server.onclose = () => resolve();
  });
  const stop = () => {
    server.close().catch((err: unknown) => {
      logger.warn("server.close", { message: err instanceof Error ? err.message : String(err) });
    });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  await server.connect(transport);
  logger.info("server.started", { tools: hub.listTools().length });
  await closed;
  await hub.shutdown();
}

function toMcpTool(spec: ToolSpec) {
  return {
    name: toMcpToolName(spec.name),
    description: spec.description,
    inputSchema: { ...spec.inputSchema, type: "object" as const },
    annotations: spec.annotations,
  };
}

function renderResult(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value ?? null);
}
