import fs from "node:fs/promises";
import path from "node:path";
import dotenv from "dotenv";
import yaml from "js-yaml";
import { z } from "zod";
import { DEFAULT_SCHOLAR_TOOLS_CONFIG, type ScholarToolsConfig } from "../scholar/types.js";
import type { BudgetOptions } from "../core/Budget.js";
import type { DebugOptions } from "../observability/Logger.js";
import type { Capability } from "../types/ToolSpec.js";

/** Config file looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = "scholartools.yaml";
/** Fills in environment variables that are not already set. */
export const DOTENV_FILE = ".env";

const defaults = DEFAULT_SCHOLAR_TOOLS_CONFIG;

const LogLevelSchema = z.enum(["silent", "error", "warn", "info", "debug", "trace"]);

export const ScholarConfigSchema = z
  .object({
    openalex: z
      .object({
        baseUrl: z.string().url().default(defaults.openalex.baseUrl),
        mailto: z.string().email().default(defaults.openalex.mailto),
        perPage: z.number().int().min(1).max(200).default(defaults.openalex.perPage),
      })
      .strict()
      .default({}),
    http: z
      .object({
        timeoutMs: z.number().int().positive().default(defaults.http.timeoutMs),
        maxRetries: z.number().int().min(1).max(10).default(defaults.http.maxRetries),
        jitterMaxSeconds: z.number().min(0).max(10).default(defaults.http.jitterMaxSeconds),
        userAgent: z.string().min(1).default(defaults.http.userAgent),
      })
      .strict()
      .default({}),
    fulltext: z
      .object({
        proxyBaseUrl: z.string().url().default(defaults.fulltext.proxyBaseUrl),
        resolveHosts: z.boolean().default(defaults.fulltext.resolveHosts),
      })
      .strict()
      .default({}),
    runtime: z
      .object({
        defaultTimeoutMs: z.number().int().positive().default(60_000),
        toolTimeoutsMs: z.record(z.number().int().positive()).optional(),
        maxConcurrency: z.number().int().positive().optional(),
        rateLimit: z
          .object({ maxCalls: z.number().int().positive(), windowMs: z.number().int().positive() })
          .optional(),
        circuitBreaker: z
          .object({
            threshold: z.number().int().positive(),
            halfOpenAfterMs: z.number().int().positive(),
          })
          .optional(),
        permissions: z
          .array(z.enum(["network", "read:web"]))
          .default(["network", "read:web"]),
      })
      .strict()
      .default({}),
    debug: z
      .object({
        enabled: z.boolean().optional(),
        level: LogLevelSchema.optional(),
        includeArgs: z.boolean().optional(),
        includeResults: z.boolean().optional(),
        logEvents: z.boolean().optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ScholarConfigInput = z.input<typeof ScholarConfigSchema>;
export type ScholarConfig = z.output<typeof ScholarConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ScholarConfigLoadResult {
  /** Absolute path of the file read, if any */
  configPath?: string;
  config: ScholarConfig;
}

export interface LoadConfigOptions {
  /** Explicit file; must exist */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Read `.env` from `cwd` (default: true) */
  dotenv?: boolean;
}

/**
 * Load `scholartools.yaml` (optional unless a path is given), apply
 * environment overrides and validate.
 *
 * Environment: OPENALEX_MAILTO, OPENALEX_BASE_URL, SCHOLAR_LOG_LEVEL, taken from
 * `.env` in `cwd` when the real environment does not set them.
 *
 * @throws ConfigError on unreadable YAML or invalid values
 */
export async function loadScholarConfig(
  options: LoadConfigOptions = {},
): Promise<ScholarConfigLoadResult> {
  const cwd = options.cwd ?? process.cwd();
  const fileEnv = options.dotenv === false ? {} : await readDotEnv(cwd);
  const env: NodeJS.ProcessEnv = { ...fileEnv, ...(options.env ?? process.env) };
  const explicit = options.configPath !== undefined;
  const resolvedPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

  let text: string | undefined;
  try {
    text = await fs.readFile(resolvedPath, "utf-8");
  } catch (err) {
    if (explicit || !isMissingFile(err)) {
      throw new ConfigError(
        `Cannot read config file ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  let raw: unknown = {};
  if (text !== undefined) {
    try {
      raw = yaml.load(text) ?? {};
    } catch (err) {
      throw new ConfigError(
        `Invalid YAML in ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  const source = text === undefined ? "defaults" : resolvedPath;
  const fromFile = parseConfig(raw, source);
  const config = parseConfig(applyEnvOverrides(fromFile, env), `${source} + environment`);

  return { configPath: text === undefined ? undefined : resolvedPath, config };
}

/**
 * Validate a raw config object.
 *
 * @throws ConfigError listing every invalid key
 */
export function parseConfig(raw: unknown, source = "config"): ScholarConfig {
  const result = ScholarConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration in ${source}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function applyEnvOverrides(
  config: ScholarConfig,
  env: NodeJS.ProcessEnv,
): ScholarConfigInput {
  const mailto = env.OPENALEX_MAILTO?.trim();
  const baseUrl = env.OPENALEX_BASE_URL?.trim();
  const level = LogLevelSchema.safeParse(env.SCHOLAR_LOG_LEVEL?.trim().toLowerCase());

  return {
    ...config,
    openalex: {
      ...config.openalex,
      ...(mailto ? { mailto } : {}),
      ...(baseUrl ? { baseUrl } : {}),
    },
    debug: level.success
      ? { ...config.debug, level: level.data, enabled: level.data !== "silent" }
      : config.debug,
  };
}

export function toScholarToolsConfig(config: ScholarConfig): ScholarToolsConfig {
  return {
    openalex: { ...config.openalex },
    http: { ...config.http },
    fulltext: { ...config.fulltext },
  };
}

export function toBudgetOptions(config: ScholarConfig): BudgetOptions {
  const { defaultTimeoutMs, toolTimeoutsMs, maxConcurrency, rateLimit, circuitBreaker } =
    config.runtime;
  return { defaultTimeoutMs, toolTimeoutsMs, maxConcurrency, rateLimit, circuitBreaker };
}

export function toDebugOptions(config: ScholarConfig): DebugOptions {
  return { ...config.debug };
}

export function toPermissions(config: ScholarConfig): Capability[] {
  return [...config.runtime.permissions];
}

async function readDotEnv(cwd: string): Promise<Record<string, string>> {
  const file = path.resolve(cwd, DOTENV_FILE);
  try {
    return dotenv.parse(await fs.readFile(file, "utf-8"));
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw new ConfigError(
      `Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
