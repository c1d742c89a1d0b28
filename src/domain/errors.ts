import { Schema } from "effect";
import { AccountRole } from "./credentials.js";

export class BskyError extends Schema.TaggedError<BskyError>()(
  "BskyError",
  {
    message: Schema.String,
    cause: Schema.optional(Schema.Unknown),
    operation: Schema.optional(Schema.String),
    status: Schema.optional(Schema.Number),
    error: Schema.optional(Schema.String)
  }
) {}

export const AuthErrorKind = Schema.Literal(
  "InvalidCredentials",
  "Network",
  "ServiceUnavailable"
);
export type AuthErrorKind = typeof AuthErrorKind.Type;

export class AuthError extends Schema.TaggedError<AuthError>()(
  "AuthError",
  {
    role: AccountRole,
    kind: AuthErrorKind,
    message: Schema.String,
    status: Schema.optional(Schema.Number)
  }
) {}

export const FetchErrorKind = Schema.Literal("NotFound", "InvalidRef", "Transient");
export type FetchErrorKind = typeof FetchErrorKind.Type;

export class FetchError extends Schema.TaggedError<FetchError>()(
  "FetchError",
  {
    kind: FetchErrorKind,
    list: Schema.String,
    message: Schema.String,
    status: Schema.optional(Schema.Number)
  }
) {}

export const CreateErrorKind = Schema.Literal("Validation", "Transient");
export type CreateErrorKind = typeof CreateErrorKind.Type;

export class CreateError extends Schema.TaggedError<CreateError>()(
  "CreateError",
  {
    kind: CreateErrorKind,
    message: Schema.String,
    status: Schema.optional(Schema.Number)
  }
) {}

export class ConfigError extends Schema.TaggedError<ConfigError>()(
  "ConfigError",
  {
    message: Schema.String,
    path: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Unknown)
  }
) {}

export class CredentialError extends Schema.TaggedError<CredentialError>()(
  "CredentialError",
  { role: AccountRole, message: Schema.String }
) {}

/** Setup-phase failures; any of these stops a migration before replication. */
export type MigrationError = AuthError | FetchError | CreateError;
