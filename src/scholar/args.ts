import { createTaggedError } from "../core/Retry.js";

// Arguments arrive schema-validated with defaults applied; these readers only narrow.

export function readString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== "string") {
    throw createTaggedError("INPUT_SCHEMA_INVALID", `Argument "${key}" must be a string`, { key });
  }
  return value;
}

export function readOptionalString(
  args: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  return readString(args, key);
}

export function readInteger(
  args: Record<string, unknown>,
  key: string,
  fallback: number,
): number {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw createTaggedError("INPUT_SCHEMA_INVALID", `Argument "${key}" must be an integer`, { key });
  }
  return value;
}

export function readChoice<T extends string>(
  args: Record<string, unknown>,
  key: string,
  choices: readonly T[],
  fallback: T,
): T {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw createTaggedError(
      "INPUT_SCHEMA_INVALID",
      `Argument "${key}" must be one of: ${choices.join(", ")}`,
      { key },
    );
  }
  return match;
}
