import { FileSystem } from "@effect/platform";
import { Path } from "@effect/platform";
import { Config, Effect, Option, Schema } from "effect";
import { formatSchemaError, pickDefined } from "./shared.js";
import { AppConfig, LogFormat } from "../domain/config.js";
import type { AccountRole } from "../domain/credentials.js";
import { ConfigError } from "../domain/errors.js";

/**
 * Application Configuration Service
 *
 * Resolves the service endpoints and log format from several layers.
 *
 * Configuration Resolution Priority (highest to lowest):
 * 1. Runtime overrides (ConfigOverrides service)
 * 2. Environment variables (LIST_MIGRATOR_*)
 * 3. Config file (~/.list-migrator/config.json)
 * 4. Default values
 *
 * Environment Variables:
 * - LIST_MIGRATOR_SERVICE: service used for both accounts (default: https://bsky.social)
 * - LIST_MIGRATOR_SOURCE_SERVICE: service for the source account only
 * - LIST_MIGRATOR_DEST_SERVICE: service for the destination account only
 * - LIST_MIGRATOR_LOG_FORMAT: json or human
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { AppConfigService, ConfigOverrides } from "./services/app-config.js";
 *
 * const program = Effect.gen(function* () {
 *   const config = yield* AppConfigService;
 *   console.log(`Service: ${config.service}`);
 * });
 *
 * const withOverrides = program.pipe(
 *   Effect.provide(AppConfigService.layer),
 *   Effect.provide(ConfigOverrides.layer)
 * );
 * ```
 *
 * @module services/app-config
 */

type AppConfigOverrides = Partial<AppConfig>;

/**
 * Runtime configuration overrides, taking precedence over environment
 * variables and the config file. The CLI fills this from its global options.
 */
export class ConfigOverrides extends Effect.Service<ConfigOverrides>()(
  "@list-migrator/ConfigOverrides",
  {
    succeed: {} as AppConfigOverrides
  }
) {
  static readonly layer = ConfigOverrides.Default;
}

const PartialAppConfig = Schema.Struct({
  service: Schema.optional(Schema.String),
  sourceService: Schema.optional(Schema.String),
  destinationService: Schema.optional(Schema.String),
  logFormat: Schema.optional(LogFormat)
});

type PartialAppConfig = typeof PartialAppConfig.Type;

const defaultService = "https://bsky.social";
const defaultRootDirName = ".list-migrator";
const configFileName = "config.json";

const resolveHomeDir = () =>
  process.env.HOME ?? process.env.USERPROFILE ?? process.env.HOMEPATH;

const resolveConfigRoot = (path: Path.Path) => {
  const home = resolveHomeDir();
  return home ? path.join(home, defaultRootDirName) : path.resolve(defaultRootDirName);
};

const decodeConfigJson = (raw: string, configPath: string) =>
  Schema.decodeUnknown(Schema.parseJson(PartialAppConfig))(raw).pipe(
    Effect.mapError((error) =>
      ConfigError.make({
        message: `Invalid config JSON at ${configPath}: ${formatSchemaError(error)}`,
        path: configPath,
        cause: error
      })
    )
  );

const loadFileConfig = (configPath: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const content = yield* fs.readFileString(configPath).pipe(
      Effect.map(Option.some),
      Effect.catchTag("SystemError", (error) =>
        error.reason === "NotFound"
          ? Effect.succeed(Option.none())
          : Effect.fail(
              ConfigError.make({
                message: `Failed to read config at ${configPath}`,
                path: configPath,
                cause: error
              })
            )
      )
    );

    return yield* Option.match(content, {
      onNone: () => Effect.succeed<PartialAppConfig>({}),
      onSome: (raw) => decodeConfigJson(raw, configPath)
    });
  });

const envLogFormat = Config.literal("json", "human")("LIST_MIGRATOR_LOG_FORMAT");

const isHttpUrl = (value: string) => {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
};

/** The service endpoint a given account logs in against. */
export const serviceFor = (
  config: Pick<AppConfig, "service" | "sourceService" | "destinationService">,
  role: AccountRole
) =>
  (role === "source" ? config.sourceService : config.destinationService) ?? config.service;

/**
 * Service for accessing the resolved application configuration.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const config = yield* AppConfigService;
 *   return serviceFor(config, "destination");
 * }).pipe(Effect.provide(AppConfigService.layer));
 * ```
 */
export class AppConfigService extends Effect.Service<AppConfigService>()(
  "@list-migrator/AppConfig",
  {
    effect: Effect.gen(function* () {
      const { _tag: _, ...overrides } = yield* ConfigOverrides;
      const path = yield* Path.Path;
      const configPath = path.join(resolveConfigRoot(path), configFileName);

      const fileConfig = yield* loadFileConfig(configPath);

      const env = yield* Config.all({
        service: Config.string("LIST_MIGRATOR_SERVICE").pipe(Config.option),
        sourceService: Config.string("LIST_MIGRATOR_SOURCE_SERVICE").pipe(Config.option),
        destinationService: Config.string("LIST_MIGRATOR_DEST_SERVICE").pipe(Config.option),
        logFormat: envLogFormat.pipe(Config.option)
      }).pipe(
        Effect.mapError((error) =>
          ConfigError.make({
            message: `Invalid environment configuration: ${String(error)}`,
            cause: error
          })
        )
      );

      const envConfig = pickDefined({
        service: Option.getOrUndefined(env.service),
        sourceService: Option.getOrUndefined(env.sourceService),
        destinationService: Option.getOrUndefined(env.destinationService),
        logFormat: Option.getOrUndefined(env.logFormat)
      });

      const merged = {
        service: defaultService,
        ...pickDefined(fileConfig),
        ...envConfig,
        ...pickDefined(overrides as Record<string, unknown>)
      };

      const decoded = yield* Schema.decodeUnknown(AppConfig)(merged).pipe(
        Effect.mapError((error) =>
          ConfigError.make({
            message: `Invalid config: ${formatSchemaError(error)}`,
            path: configPath,
            cause: error
          })
        )
      );

      const invalid = [decoded.service, decoded.sourceService, decoded.destinationService]
        .filter((value): value is string => value !== undefined)
        .find((value) => !isHttpUrl(value));
      if (invalid !== undefined) {
        return yield* ConfigError.make({
          message: `Invalid service URL: ${invalid}`,
          path: configPath
        });
      }
      return decoded;
    })
  }
) {
  /**
   * Resolution order (highest to lowest priority):
   * 1. ConfigOverrides service values
   * 2. Environment variables (LIST_MIGRATOR_*)
   * 3. ~/.list-migrator/config.json file
   * 4. Default values
   */
  static readonly layer = AppConfigService.Default;
}
