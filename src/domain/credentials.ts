import { Schema } from "effect";

/** Which side of a migration an account is on. */
export const AccountRole = Schema.Literal("source", "destination");
export type AccountRole = typeof AccountRole.Type;

/**
 * Handle (or DID) and app password for one login. Held only for the duration
 * of a run; the password stays redacted in logs and string conversions.
 */
export class BskyCredentials extends Schema.Class<BskyCredentials>("BskyCredentials")({
  identifier: Schema.String,
  password: Schema.Redacted(Schema.String)
}) {}
