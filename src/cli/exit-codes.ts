import { ValidationError } from "@effect/cli";
import { Cause, Exit, Option } from "effect";
import { CliInputError } from "./errors.js";
import {
  AuthError,
  ConfigError,
  CreateError,
  CredentialError,
  FetchError
} from "../domain/errors.js";

export const exitCodeFor = (error: unknown): number => {
  if (ValidationError.isValidationError(error)) return 2;
  if (error instanceof CliInputError) return 2;
  if (error instanceof ConfigError) return 2;
  if (error instanceof CredentialError) return 2;
  if (error instanceof AuthError) return 4;
  if (error instanceof FetchError) return 5;
  if (error instanceof CreateError) return 6;
  return 1;
};

export const exitCodeFromExit = (exit: Exit.Exit<unknown, unknown>) => {
  if (Exit.isSuccess(exit)) return 0;
  const failure = Cause.failureOption(exit.cause);
  return Option.match(failure, {
    onNone: () => 1,
    onSome: exitCodeFor
  });
};
