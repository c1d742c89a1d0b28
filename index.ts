#!/usr/bin/env node
import { Command, ValidationError } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Layer } from "effect";
import { app } from "./src/cli/app.js";
import pkg from "./package.json" with { type: "json" };
import {
  errorDetails,
  errorSuggestion,
  errorType,
  formatError
} from "./src/cli/error-envelope.js";
import { logErrorEvent } from "./src/cli/logging.js";
import { CliOutput } from "./src/cli/output.js";
import { exitCodeFor, exitCodeFromExit } from "./src/cli/exit-codes.js";

const cli = Command.run(app, {
  name: "list-migrator",
  version: pkg.version
});

const program = cli(process.argv).pipe(
  Effect.tapError((error) => {
    if (ValidationError.isValidationError(error)) {
      return Effect.void;
    }
    return logErrorEvent(formatError(error), {
      code: exitCodeFor(error),
      type: errorType(error),
      suggestion: errorSuggestion(error),
      ...errorDetails(error)
    });
  }),
  Effect.provide(Layer.mergeAll(NodeContext.layer, CliOutput.layer))
);

NodeRuntime.runMain({
  disableErrorReporting: true,
  disablePrettyLogger: true,
  teardown: (exit, onExit) => {
    const code = exitCodeFromExit(exit);
    onExit(code);
    process.exit(code);
  }
})(program);
