import { ParseResult } from "effect";
import { ConfigError } from "../domain/errors.js";

/** Extract a human-readable message from an unknown cause, falling back to the given string. */
export const messageFromCause = (fallback: string, cause: unknown) => {
  if (typeof cause === "object" && cause !== null && "message" in cause) {
    const message = (cause as { readonly message?: unknown }).message;
    if (typeof message === "string" && message.length > 0) {
      return message;
    }
  }
  return fallback;
};

/** Strip `undefined` values from a record, returning a Partial<T>. */
export const pickDefined = <T extends Record<string, unknown>>(input: T): Partial<T> =>
  Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  ) as Partial<T>;

export type XrpcDetails = {
  readonly status?: number;
  readonly error?: string;
};

/**
 * Read the HTTP status and lexicon error name off an XRPC failure.
 * Statuses below 100 are the client's own codes for transport failures and
 * are dropped.
 */
export const xrpcDetails = (cause: unknown): XrpcDetails => {
  if (typeof cause !== "object" || cause === null) {
    return {};
  }
  const rawStatus = "status" in cause ? cause.status : undefined;
  const rawError = "error" in cause ? cause.error : undefined;
  const status = typeof rawStatus === "number" && rawStatus >= 100 ? rawStatus : undefined;
  const error = typeof rawError === "string" && rawError.length > 0 ? rawError : undefined;
  return pickDefined({ status, error });
};

type FormatParseErrorOptions = {
  readonly label?: string;
  readonly maxIssues?: number;
};

const formatPath = (path: ReadonlyArray<unknown>) =>
  path.length > 0 ? path.map((entry) => String(entry)).join(".") : "value";

export const formatParseError = (
  error: ParseResult.ParseError,
  options?: FormatParseErrorOptions
) => {
  const issues = ParseResult.ArrayFormatter.formatErrorSync(error);
  if (issues.length === 0) {
    return ParseResult.TreeFormatter.formatErrorSync(error);
  }

  const maxIssues = options?.maxIssues ?? 6;
  const lines = issues.slice(0, maxIssues).map((issue) => {
    const path = formatPath(issue.path);
    return `${path}: ${issue.message}`;
  });
  if (issues.length > maxIssues) {
    lines.push(`Additional issues: ${issues.length - maxIssues}`);
  }

  const header = options?.label ? `Invalid ${options.label}.` : undefined;
  return header ? [header, ...lines].join("\n") : lines.join("\n");
};

/** Format a Schema parse error (or arbitrary unknown) as a readable string. */
export const formatSchemaError = (error: unknown) => {
  if (ParseResult.isParseError(error)) {
    return formatParseError(error);
  }
  return String(error);
};

/** Validate that a numeric config value is >= 1. */
export const validatePositive = (name: string, value: number) => {
  if (!Number.isFinite(value) || value < 1) {
    return ConfigError.make({ message: `${name} must be >= 1.` });
  }
};

/** Validate that a numeric config value is >= 0. */
export const validateNonNegative = (name: string, value: number) => {
  if (!Number.isFinite(value) || value < 0) {
    return ConfigError.make({ message: `${name} must be >= 0.` });
  }
};
