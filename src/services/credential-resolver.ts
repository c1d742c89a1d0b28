/**
 * Credential Resolver Service
 *
 * Resolves the handle and app password for each account taking part in a
 * migration. Credentials are request-scoped: nothing is read from or written
 * to disk, and passwords stay wrapped in `Redacted` until the login call.
 *
 * Resolution priority, per account role:
 * 1. Runtime overrides (via CredentialsOverrides context, filled from CLI flags)
 * 2. Environment variables
 *
 * **Environment Variables:**
 * - `LIST_MIGRATOR_SOURCE_HANDLE` / `LIST_MIGRATOR_SOURCE_PASSWORD`
 * - `LIST_MIGRATOR_DEST_HANDLE` / `LIST_MIGRATOR_DEST_PASSWORD`
 *
 * @module services/credential-resolver
 */

import { Config, Effect, Option, Redacted, Schema } from "effect";
import { type AccountRole, BskyCredentials } from "../domain/credentials.js";
import { CredentialError } from "../domain/errors.js";
import { ActorId } from "../domain/primitives.js";

export type RoleCredentialsOverride = {
  /** Bluesky handle or DID */
  readonly identifier?: string;
  /** App password */
  readonly password?: Redacted.Redacted<string>;
};

export type CredentialsOverridesValue = {
  readonly source?: RoleCredentialsOverride;
  readonly destination?: RoleCredentialsOverride;
};

/**
 * Context tag for runtime credential overrides.
 *
 * @example
 * ```typescript
 * const withOverrides = program.pipe(
 *   Effect.provideService(CredentialsOverrides, CredentialsOverrides.make({
 *     source: { identifier: "alice.test", password: Redacted.make("test-secret") }
 *   }))
 * );
 * ```
 */
export class CredentialsOverrides extends Effect.Service<CredentialsOverrides>()(
  "@list-migrator/CredentialsOverrides",
  {
    succeed: {} as CredentialsOverridesValue
  }
) {
  static readonly layer = CredentialsOverrides.Default;
}

const envPrefix = (role: AccountRole) =>
  role === "source" ? "LIST_MIGRATOR_SOURCE" : "LIST_MIGRATOR_DEST";

const flagPrefix = (role: AccountRole) => (role === "source" ? "--source" : "--dest");

const nonEmpty = (value: string | undefined) =>
  value !== undefined && value.trim().length > 0 ? value.trim() : undefined;

/** "@Alice.bsky.social" logs in as "alice.bsky.social"; anything unparseable is sent as typed. */
const normalizeIdentifier = (identifier: string) =>
  Option.getOrElse(Schema.decodeUnknownOption(ActorId)(identifier), () => identifier);

export interface CredentialResolverService {
  /** Credentials for the role, or None when either part is missing. */
  readonly get: (role: AccountRole) => Effect.Effect<Option.Option<BskyCredentials>>;

  /** Credentials for the role, failing with a hint naming the flag and variable to set. */
  readonly require: (role: AccountRole) => Effect.Effect<BskyCredentials, CredentialError>;
}

export class CredentialResolver extends Effect.Service<CredentialResolver>()(
  "@list-migrator/CredentialResolver",
  {
    effect: Effect.gen(function* () {
      const { _tag: _, ...overrides } = yield* CredentialsOverrides;

      const readEnv = (role: AccountRole) =>
        Effect.gen(function* () {
          const prefix = envPrefix(role);
          const identifier = yield* Config.string(`${prefix}_HANDLE`).pipe(Config.option);
          const password = yield* Config.redacted(`${prefix}_PASSWORD`).pipe(Config.option);
          return { identifier, password };
        });

      const source = yield* readEnv("source");
      const destination = yield* readEnv("destination");

      const get = Effect.fn("CredentialResolver.get")((role: AccountRole) =>
        Effect.sync(() => {
          const env = role === "source" ? source : destination;
          const override = overrides[role] ?? {};
          const identifier =
            nonEmpty(override.identifier) ?? nonEmpty(Option.getOrUndefined(env.identifier));
          const password = override.password ?? Option.getOrUndefined(env.password);
          if (!identifier || !password || Redacted.value(password).length === 0) {
            return Option.none<BskyCredentials>();
          }
          return Option.some(
            BskyCredentials.make({ identifier: normalizeIdentifier(identifier), password })
          );
        })
      );

      const require = Effect.fn("CredentialResolver.require")((role: AccountRole) =>
        get(role).pipe(
          Effect.flatMap(
            Option.match({
              onNone: () =>
                CredentialError.make({
                  role,
                  message: `Missing ${role} credentials. Pass ${flagPrefix(role)}-handle and ${flagPrefix(role)}-password or set ${envPrefix(role)}_HANDLE and ${envPrefix(role)}_PASSWORD.`
                }),
              onSome: Effect.succeed
            })
          )
        )
      );

      const service: CredentialResolverService = { get, require };
      return service;
    })
  }
) {
  static readonly layer = CredentialResolver.Default;
}
