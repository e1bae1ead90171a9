export type {
  ToolKind,
  Capability,
  CostHints,
  ToolSpec,
  ToolAdapter,
} from "./ToolSpec.js";

export type {
  BudgetConfig,
  ExecContext,
  ToolIntent,
} from "./ToolIntent.js";

export type {
  Evidence,
  ToolErrorKind,
  ToolError,
  ToolResult,
} from "./ToolResult.js";

export type {
  ToolEventType,
  ToolEvent,
  ToolCalledEvent,
  ToolResultEvent,
  PolicyDeniedEvent,
  RetryEvent,
  AnyToolEvent,
} from "./Events.js";
