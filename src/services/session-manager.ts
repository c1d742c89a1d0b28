/**
 * Session Manager
 *
 * Establishes one authenticated session per account. Every call performs its
 * own createSession round trip, so the source and destination sessions stay
 * independent even when both handles are the same. Failures are classified
 * and never retried here; whether to prompt again is the caller's decision.
 *
 * @module services/session-manager
 */

import { Context, Effect, Layer, Redacted } from "effect";
import { BskyClient, type BskySession } from "./bsky-client.js";
import type { AccountRole, BskyCredentials } from "../domain/credentials.js";
import { AuthError, type AuthErrorKind, type BskyError } from "../domain/errors.js";

export type Session = BskySession;

const invalidCredentialStatuses = new Set([400, 401, 403]);

/**
 * Map a createSession failure onto the auth taxonomy. A response with an
 * HTTP status means the service answered; no status means the request never
 * completed.
 */
export const classifyAuthFailure = (error: BskyError): AuthErrorKind => {
  if (error.status === undefined) {
    return "Network";
  }
  if (invalidCredentialStatuses.has(error.status)) {
    return "InvalidCredentials";
  }
  return "ServiceUnavailable";
};

const describeKind = (kind: AuthErrorKind) => {
  switch (kind) {
    case "InvalidCredentials":
      return "the handle or app password was rejected";
    case "Network":
      return "the service could not be reached";
    case "ServiceUnavailable":
      return "the service is unavailable";
  }
};

export class SessionManager extends Context.Tag("@list-migrator/SessionManager")<
  SessionManager,
  {
    readonly authenticate: (
      role: AccountRole,
      credentials: BskyCredentials
    ) => Effect.Effect<Session, AuthError>;
  }
>() {
  static readonly layer = Layer.effect(
    SessionManager,
    Effect.gen(function* () {
      const client = yield* BskyClient;

      const authenticate = Effect.fn("SessionManager.authenticate")(
        (role: AccountRole, credentials: BskyCredentials) =>
          Effect.gen(function* () {
            const identifier = credentials.identifier.trim();
            if (identifier.length === 0 || Redacted.value(credentials.password).length === 0) {
              return yield* AuthError.make({
                role,
                kind: "InvalidCredentials",
                message: `Login failed for ${role} account: handle and app password are required.`
              });
            }
            return yield* client.login(role, credentials).pipe(
              Effect.mapError((error) => {
                const kind = classifyAuthFailure(error);
                return AuthError.make({
                  role,
                  kind,
                  message: `Login failed for ${role} account ${identifier}: ${describeKind(kind)}.`,
                  status: error.status
                });
              })
            );
          })
      );

      return SessionManager.of({ authenticate });
    })
  );
}
