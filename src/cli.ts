#!/usr/bin/env node
/**
 * CLI for scholar-tools: serve the tools over MCP stdio, list them, or call one.
 * Usage: scholar-tools <command> [options]
 * Commands: serve | list | call | help
 */

import { fileURLToPath } from "node:url";
import { ConfigError, DEFAULT_CONFIG_FILE, loadScholarConfig } from "./config/ScholarConfig.js";
import { createScholarHub, type ScholarHub, type ScholarHubOptions } from "./hub/ScholarHub.js";
import { serveStdio, toMcpToolName } from "./server/McpServer.js";
import type { ToolSpec } from "./types/ToolSpec.js";

type DetailLevel = "short" | "normal" | "full";

type Command = "serve" | "list" | "call" | "help";

interface CliArgs {
  command: Command;
  configPath?: string;
  detail: DetailLevel;
  tool?: string;
  argsJson?: string;
  help: boolean;
  unknown?: string;
}

/** Hub wiring injected by tests. */
export type CliHubOptions = Omit<ScholarHubOptions, "config">;

function isCommand(value: string): value is Command {
  return value === "serve" || value === "list" || value === "call" || value === "help";
}

function parseArgv(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const parsed: CliArgs = { command: "help", detail: "normal", help: false };
  let sawCommand = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--config" || arg === "-c") {
      parsed.configPath = args[++i] ?? "";
    } else if (arg === "--detail" || arg === "-d") {
      const v = (args[++i] ?? "normal").toLowerCase();
      parsed.detail = v === "short" || v === "full" ? v : "normal";
    } else if (arg === "--args" || arg === "-a") {
      parsed.argsJson = args[++i] ?? "";
    } else if (arg && !arg.startsWith("-")) {
      if (!sawCommand) {
        sawCommand = true;
        if (isCommand(arg)) parsed.command = arg;
        else parsed.unknown = arg;
      } else if (parsed.command === "call" && parsed.tool === undefined) {
        parsed.tool = arg;
      }
    }
  }

  return parsed;
}

function printHelp(): void {
  const bin = "scholar-tools";
  process.stdout.write(`
Usage: ${bin} <command> [options]

Commands:
  serve                 Run the MCP server on stdio.
  list                  List tools (use --detail to control output).
  call <tool>           Invoke one tool and print its result.
  help                  Show this help.

Options:
  --config, -c <path>   Config file path (default: ./${DEFAULT_CONFIG_FILE}, optional).
  --detail, -d <level>  For 'list': short | normal | full (default: normal).
  --args, -a <json>     For 'call': tool arguments as a JSON object.
  --help, -h            Show this help.

Environment:
  OPENALEX_MAILTO, OPENALEX_BASE_URL, SCHOLAR_LOG_LEVEL

Examples:
  ${bin} serve
  ${bin} list --detail short
  ${bin} call scholar/search_papers --args '{"query":"graph neural networks"}'
`);
}

function formatSpecShort(spec: ToolSpec): string {
  return spec.name;
}

function formatSpecNormal(spec: ToolSpec): string {
  const flat = (spec.description ?? "").replace(/\s+/g, " ").trim();
  const desc = flat.length > 60 ? `${flat.slice(0, 60)}...` : flat;
  return `${spec.name}\t${spec.kind}\t${desc}`;
}

function formatSpecFull(spec: ToolSpec): string {
  return JSON.stringify(
    {
      name: spec.name,
      mcpName: toMcpToolName(spec.name),
      kind: spec.kind,
      version: spec.version,
      description: spec.description,
      tags: spec.tags,
      capabilities: spec.capabilities,
      inputSchema: spec.inputSchema,
    },
    null,
    2,
  );
}

function cmdList(hub: ScholarHub, detail: DetailLevel): number {
  const specs = hub.listTools();
  const formatter =
    detail === "short" ? formatSpecShort : detail === "full" ? formatSpecFull : formatSpecNormal;
  if (detail === "normal") {
    process.stdout.write("name\tkind\tdescription\n");
  }
  for (const spec of specs) {
    process.stdout.write(formatter(spec) + "\n");
  }
  return 0;
}

function parseToolArgs(argsJson: string | undefined): Record<string, unknown> {
  if (argsJson === undefined || argsJson.trim() === "") return {};
  let value: unknown;
  try {
    value = JSON.parse(argsJson);
  } catch (err) {
    throw new CliUsageError(
      `--args is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new CliUsageError("--args must be a JSON object");
  }
  return { ...value };
}

async function cmdCall(hub: ScholarHub, tool: string | undefined, argsJson?: string): Promise<number> {
  if (!tool) {
    throw new CliUsageError("call requires a tool name, e.g. scholar/search_papers");
  }
  const args = parseToolArgs(argsJson);
  const name = hub.getTool(tool)
    ? tool
    : hub.listTools().find((s) => toMcpToolName(s.name) === tool)?.name ?? tool;

  const result = await hub.invokeTool(name, args, { purpose: "cli.call" });
  if (!result.ok) {
    const kind = result.error?.kind ?? "UPSTREAM_ERROR";
    process.stderr.write(`Error [${kind}]: ${result.error?.message ?? "Tool invocation failed"}\n`);
    return 1;
  }
  const text =
    typeof result.result === "string" ? result.result : JSON.stringify(result.result, null, 2);
  process.stdout.write(text + "\n");
  return 0;
}

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

async function main(argv: string[] = process.argv, hubOptions: CliHubOptions = {}): Promise<number> {
  const { command, configPath, detail, tool, argsJson, help, unknown } = parseArgv(argv);

  if (unknown !== undefined) {
    process.stderr.write(`Error: unknown command: ${unknown}\n`);
    printHelp();
    return 1;
  }
  if (help || command === "help") {
    printHelp();
    return 0;
  }

  let hub: ScholarHub;
  try {
    const { config } = await loadScholarConfig({ configPath });
    hub = createScholarHub({ ...hubOptions, config });
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }

  try {
    switch (command) {
      case "serve":
        await serveStdio(hub);
        return 0;
      case "list":
        return cmdList(hub, detail);
      case "call":
        return await cmdCall(hub, tool, argsJson);
    }
  } catch (err) {
    if (err instanceof CliUsageError) {
      process.stderr.write(`Error: ${err.message}\n`);
      return 2;
    }
    throw err;
  } finally {
    await hub.shutdown();
  }
}

/** Run CLI with the given argv (same shape as process.argv). Exported for tests. */
export async function run(argv: string[], hubOptions: CliHubOptions = {}): Promise<number> {
  return main(argv, hubOptions);
}

const isMain =
  typeof process !== "undefined" &&
  process.argv[1] !== undefined &&
  process.argv[1] === fileURLToPath(import.meta.url);

if (isMain) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      process.exit(1);
    });
}
