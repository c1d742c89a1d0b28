import { HelpDoc, ValidationError } from "@effect/cli";
import {
  AuthError,
  BskyError,
  ConfigError,
  CreateError,
  CredentialError,
  FetchError
} from "../domain/errors.js";
import { CliInputError } from "./errors.js";

const stripAnsi = (value: string) =>
  value.replace(/\u001b\[[0-9;]*m/g, "");

const formatValidationError = (error: ValidationError.ValidationError) => {
  const text = HelpDoc.toAnsiText(error.error).trimEnd();
  return stripAnsi(text.length > 0 ? text : "Invalid command input. Use --help for usage.");
};

export const formatError = (error: unknown) => {
  if (ValidationError.isValidationError(error)) {
    return formatValidationError(error);
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null && "_tag" in error) {
    return JSON.stringify(error);
  }
  return String(error);
};

export const errorType = (error: unknown): string => {
  if (ValidationError.isValidationError(error)) return "ValidationError";
  if (error instanceof Error) return error.name;
  if (typeof error === "object" && error !== null && "_tag" in error) {
    return String(error._tag ?? "UnknownError");
  }
  return "UnknownError";
};

export const errorDetails = (error: unknown): Record<string, unknown> | undefined => {
  if (error instanceof AuthError) {
    return { role: error.role, kind: error.kind, status: error.status };
  }
  if (error instanceof FetchError) {
    return { kind: error.kind, list: error.list, status: error.status };
  }
  if (error instanceof CreateError) {
    return { kind: error.kind, status: error.status };
  }
  if (error instanceof BskyError) {
    return { operation: error.operation, status: error.status };
  }
  return undefined;
};

export const errorSuggestion = (error: unknown): string | undefined => {
  if (error instanceof CredentialError) {
    return "Pass the handle and app password flags, or set the LIST_MIGRATOR_*_HANDLE and LIST_MIGRATOR_*_PASSWORD variables.";
  }
  if (error instanceof AuthError) {
    switch (error.kind) {
      case "InvalidCredentials":
        return "Check the handle and use an app password from Settings > App Passwords.";
      case "Network":
        return "Check the network connection and the --service URL.";
      case "ServiceUnavailable":
        return "The service is busy or down; try again later.";
    }
  }
  if (error instanceof FetchError) {
    switch (error.kind) {
      case "InvalidRef":
        return "Use a list reference of the form at://<did>/app.bsky.graph.list/<rkey>.";
      case "NotFound":
        return "Check that the list exists and is visible to the source account.";
      case "Transient":
        return "Try again; nothing has been written yet.";
    }
  }
  if (error instanceof CreateError) {
    // A transient failure may arrive after the record was written.
    return error.kind === "Validation"
      ? "Check the list name and description."
      : "Check the destination account for a partially created list before re-running; the create may have succeeded.";
  }
  if (error instanceof ConfigError && error.path) {
    return `Fix or remove ${error.path}`;
  }
  if (error instanceof CliInputError) {
    return "Run with --help for usage.";
  }
  return undefined;
};
