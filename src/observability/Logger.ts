export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export interface DebugOptions {
  enabled?: boolean;
  level?: LogLevel;
  /** Log sanitized tool arguments on invoke */
  includeArgs?: boolean;
  /** Log result summaries on success */
  includeResults?: boolean;
  /** Mirror every event-log entry at debug level */
  logEvents?: boolean;
  prefix?: string;
  /** Line sink. Defaults to stderr, since stdout carries the MCP stream. */
  write?: (line: string) => void;
}

export type ResolvedDebugOptions = Required<Omit<DebugOptions, "write">>;

type Meta = Record<string, unknown>;

export interface Logger {
  options: ResolvedDebugOptions;
  isEnabled(level: LogLevel): boolean;
  /** Same sink and level, different prefix. */
  child(prefix: string): Logger;
  error(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  debug(message: string, meta?: Meta): void;
  trace(message: string, meta?: Meta): void;
}

// Index is verbosity: a message is written when its index <= the configured one.
const LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

const SECRET_FIELD = /"(password|token|secret|key|auth|mailto)":\s*"[^"]*"/gi;

/**
 * Leveled line logger: `[prefix] [LEVEL] message {meta}`.
 * Without explicit options, `SCHOLAR_LOG_LEVEL` (or `DEBUG`) decides.
 */
export function createLogger(options: DebugOptions = {}): Logger {
  const resolved = resolveDebugOptions(options);
  const write = options.write ?? ((line: string) => console.error(line));
  const threshold = LEVELS.indexOf(resolved.level);

  const isEnabled = (level: LogLevel) =>
    resolved.enabled && level !== "silent" && LEVELS.indexOf(level) <= threshold;

  const at = (level: LogLevel) => (message: string, meta?: Meta) => {
    if (!isEnabled(level)) return;
    const tail = meta ? ` ${truncatedJson(meta, 1000)}` : "";
    write(`[${resolved.prefix}] [${level.toUpperCase()}] ${message}${tail}`);
  };

  return {
    options: resolved,
    isEnabled,
    child: (prefix) => createLogger({ ...resolved, prefix, write }),
    error: at("error"),
    warn: at("warn"),
    info: at("info"),
    debug: at("debug"),
    trace: at("trace"),
  };
}

export function resolveDebugOptions(options: DebugOptions = {}): ResolvedDebugOptions {
  const fromEnv = envLogLevel();
  const enabled = options.enabled ?? (fromEnv !== undefined && fromEnv !== "silent");
  return {
    enabled,
    level: options.level ?? fromEnv ?? (enabled ? "info" : "silent"),
    includeArgs: options.includeArgs ?? false,
    includeResults: options.includeResults ?? false,
    logEvents: options.logEvents ?? false,
    prefix: options.prefix ?? "scholar-tools",
  };
}

/** JSON for a log line, with credential and contact fields masked. */
export function sanitizeForLog(value: unknown, maxLen = 500): string {
  return truncatedJson(value, maxLen).replace(SECRET_FIELD, '"$1":"[REDACTED]"');
}

/** A short description of a value's shape: strings clipped, containers by size or keys. */
export function summarizeForLog(value: unknown, maxLen = 200): string {
  if (value === null || value === undefined) return String(value);
  switch (typeof value) {
    case "string":
      return clip(value, maxLen);
    case "object": {
      if (Array.isArray(value)) return `Array(${value.length})`;
      const keys = Object.keys(value);
      const more = keys.length > 5 ? ", ..." : "";
      return `Object(keys: ${keys.slice(0, 5).join(", ")}${more})`;
    }
    default:
      return String(value);
  }
}

function truncatedJson(value: unknown, maxLen: number): string {
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    // cycles and BigInt
    text = String(value);
  }
  return clip(text, maxLen);
}

function clip(text: string, maxLen: number): string {
  return text.length > maxLen ? `${text.slice(0, maxLen)}...` : text;
}

const ENV_KEYWORDS: ReadonlyArray<[string, LogLevel]> = [
  ["trace", "trace"],
  ["debug", "debug"],
  ["info", "info"],
  ["warn", "warn"],
  ["error", "error"],
  ["silent", "silent"],
];

function envLogLevel(): LogLevel | undefined {
  const value = process.env.SCHOLAR_LOG_LEVEL ?? process.env.DEBUG;
  if (!value) return undefined;
  const raw = value.trim().toLowerCase();
  if (["", "0", "false", "off"].includes(raw)) return "silent";
  if (["1", "true", "yes"].includes(raw)) return "debug";
  const match = ENV_KEYWORDS.find(([keyword]) => raw.includes(keyword));
  // DEBUG=scholar-tools and similar namespace lists mean "debug"
  return match ? match[1] : "debug";
}
