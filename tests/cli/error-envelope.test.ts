import { describe, expect, test } from "vitest";
import {
  errorDetails,
  errorSuggestion,
  formatError
} from "../../src/cli/error-envelope.js";
import { AuthError, CreateError, FetchError } from "../../src/domain/errors.js";

describe("error envelope", () => {
  test("a transient create failure points at the destination account", () => {
    const error = CreateError.make({
      kind: "Transient",
      message: "Failed to create list",
      status: 502
    });
    expect(errorSuggestion(error)).toBe(
      "Check the destination account for a partially created list before re-running; the create may have succeeded."
    );
    expect(errorDetails(error)).toEqual({ kind: "Transient", status: 502 });
  });

  test("a rejected list points at its name and description", () => {
    const error = CreateError.make({ kind: "Validation", message: "Invalid record" });
    expect(errorSuggestion(error)).toBe("Check the list name and description.");
  });

  test("a transient fetch failure notes that nothing was written", () => {
    const error = FetchError.make({
      kind: "Transient",
      list: "at://did:plc:source/app.bsky.graph.list/abc",
      message: "Failed to fetch list"
    });
    expect(errorSuggestion(error)).toBe("Try again; nothing has been written yet.");
  });

  test("message and details come from the tagged error", () => {
    const error = AuthError.make({
      role: "source",
      kind: "InvalidCredentials",
      message: "Invalid identifier or password",
      status: 401
    });
    expect(formatError(error)).toBe("Invalid identifier or password");
    expect(errorDetails(error)).toEqual({
      role: "source",
      kind: "InvalidCredentials",
      status: 401
    });
  });
});
