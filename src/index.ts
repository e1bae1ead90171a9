// === Types ===
export type {
  ToolKind,
  Capability,
  CostHints,
  ToolSpec,
  ToolAdapter,
  BudgetConfig,
  ExecContext,
  ToolIntent,
  Evidence,
  ToolErrorKind,
  ToolError,
  ToolResult,
  ToolEventType,
  ToolEvent,
  ToolCalledEvent,
  ToolResultEvent,
  PolicyDeniedEvent,
  RetryEvent,
  AnyToolEvent,
} from "./types/index.js";

// === Core ===
export { ToolRuntime } from "./core/ToolRuntime.js";
export type { ToolRuntimeConfig } from "./core/ToolRuntime.js";
export { PolicyEngine, PolicyDeniedError } from "./core/PolicyEngine.js";
export type { PolicyConfig, PolicyCheckResult } from "./core/PolicyEngine.js";
export { SchemaValidator, SchemaValidationError } from "./core/SchemaValidator.js";
export type { ValidationResult } from "./core/SchemaValidator.js";
export { BudgetManager } from "./core/Budget.js";
export type { BudgetOptions } from "./core/Budget.js";
export {
  runWithRetry,
  computeBackoffSeconds,
  createTaggedError,
  isTaggedError,
} from "./core/Retry.js";
export type { AttemptOutcome, RetryInfo, RetryOptions, TaggedError } from "./core/Retry.js";
export { buildEvidence } from "./core/Evidence.js";
export type { BuildEvidenceOptions } from "./core/Evidence.js";

// === HTTP ===
export {
  RequestClient,
  withRequestClient,
  NOT_FOUND,
  RETRYABLE_STATUSES,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_JITTER_MAX_SECONDS,
} from "./http/RequestClient.js";
export type {
  NotFound,
  JsonValue,
  ResponseBody,
  FetchInit,
  FetchResponse,
  FetchLike,
  ConnectionHandle,
  RequestClientOptions,
  ClientFactory,
} from "./http/RequestClient.js";
export { mapping, pairs, opaque } from "./http/params.js";
export type { ParamValue, ParamMapping, ParamPair, QueryParams, ParamsInput } from "./http/params.js";
export { parseRetryAfter } from "./http/retryAfter.js";

// === Security ===
export {
  isSafeUrl,
  explainUnsafeUrl,
  assertResolvesPublic,
  isBlockedAddress,
} from "./security/urlGuard.js";
export type { LookupFn } from "./security/urlGuard.js";

// === Registry ===
export { ToolRegistry } from "./registry/ToolRegistry.js";

// === Observability ===
export { EventLog } from "./observability/EventLog.js";
export type { LogEntry, EventListener, EventQuery } from "./observability/EventLog.js";
export { createLogger, sanitizeForLog, summarizeForLog } from "./observability/Logger.js";
export type {
  Logger,
  LogLevel,
  DebugOptions,
  ResolvedDebugOptions,
} from "./observability/Logger.js";
export { Metrics } from "./observability/Metrics.js";
export type { CounterValue, HistogramValue, Labels } from "./observability/Metrics.js";
export { Tracing } from "./observability/Tracing.js";
export type { Span, SpanEvent, SpanAttributes } from "./observability/Tracing.js";

// === Scholar tools ===
export { ScholarAdapter } from "./scholar/ScholarAdapter.js";
export type { ScholarAdapterOptions } from "./scholar/ScholarAdapter.js";
export {
  ALL_SCHOLAR_TOOLS,
  registerScholarTools,
  resolveScholarToolsConfig,
} from "./scholar/ScholarToolsModule.js";
export type { ScholarToolsUserConfig } from "./scholar/ScholarToolsModule.js";
export { DEFAULT_SCHOLAR_TOOLS_CONFIG, DEFAULT_MAILTO } from "./scholar/types.js";
export type {
  ScholarToolsConfig,
  ScholarToolContext,
  ScholarToolResult,
  ScholarToolHandler,
} from "./scholar/types.js";
export type { Institution, Author, Work } from "./scholar/records.js";
export type { PageResult, ListResult } from "./scholar/pagination.js";
export { sanitizeSearchText } from "./scholar/sanitize.js";

// Tool specs (for selective registration)
export { searchPapersSpec } from "./scholar/works/searchPapers.js";
export { papersByAuthorSpec } from "./scholar/works/papersByAuthor.js";
export { worksCitingPaperSpec } from "./scholar/works/worksCitingPaper.js";
export { referencedWorksSpec } from "./scholar/works/referencedWorks.js";
export { relatedWorksSpec } from "./scholar/works/relatedWorks.js";
export { searchAuthorsSpec } from "./scholar/authors/searchAuthors.js";
export { searchInstitutionsSpec } from "./scholar/institutions/searchInstitutions.js";
export { fetchFulltextSpec } from "./scholar/fulltext/fetchFulltext.js";

// === Config ===
export {
  loadScholarConfig,
  parseConfig,
  ConfigError,
  DEFAULT_CONFIG_FILE,
  ScholarConfigSchema,
} from "./config/ScholarConfig.js";
export type {
  ScholarConfig,
  ScholarConfigInput,
  ScholarConfigLoadResult,
  LoadConfigOptions,
} from "./config/ScholarConfig.js";

// === Hub (high-level facade) ===
export { ScholarHub, createScholarHub } from "./hub/ScholarHub.js";
export type { ToolMetadata, ScholarHubOptions, InvokeOptions } from "./hub/ScholarHub.js";

// === MCP server ===
export {
  createMcpServer,
  serveStdio,
  toMcpToolName,
  SERVER_INSTRUCTIONS,
} from "./server/McpServer.js";
export type { McpServerOptions } from "./server/McpServer.js";
