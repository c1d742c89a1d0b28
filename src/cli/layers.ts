import { Layer } from "effect";
import type { AppConfig } from "../domain/config.js";
import { AppConfigService, ConfigOverrides } from "../services/app-config.js";
import { BskyClient } from "../services/bsky-client.js";
import {
  CredentialResolver,
  CredentialsOverrides,
  type CredentialsOverridesValue
} from "../services/credential-resolver.js";
import { ListCreator } from "../services/list-creator.js";
import { ListFetcher } from "../services/list-fetcher.js";
import { ListMigrator } from "../services/list-migrator.js";
import { MemberReplicator } from "../services/member-replicator.js";
import {
  MigrationSettings,
  MigrationSettingsOverrides,
  type MigrationSettingsOverridesValue
} from "../services/migration-settings.js";
import { PacingPolicy } from "../services/pacing-policy.js";
import { SessionManager } from "../services/session-manager.js";

export type CliOverrides = {
  readonly config: Partial<AppConfig>;
  readonly credentials: CredentialsOverridesValue;
  readonly settings: MigrationSettingsOverridesValue;
};

/**
 * The full service graph for one command invocation, built from the
 * command's flags. Needs FileSystem and Path from the platform context.
 */
export const makeCliLayer = (overrides: CliOverrides) => {
  const appConfigLayer = AppConfigService.layer.pipe(
    Layer.provide(Layer.succeed(ConfigOverrides, ConfigOverrides.make(overrides.config)))
  );
  const settingsLayer = MigrationSettings.layer.pipe(
    Layer.provide(Layer.succeed(MigrationSettingsOverrides, overrides.settings))
  );
  const credentialLayer = CredentialResolver.layer.pipe(
    Layer.provide(Layer.succeed(CredentialsOverrides, CredentialsOverrides.make(overrides.credentials)))
  );
  const bskyLayer = BskyClient.layer.pipe(Layer.provideMerge(appConfigLayer));
  const sessionLayer = SessionManager.layer.pipe(Layer.provideMerge(bskyLayer));
  const fetcherLayer = ListFetcher.layer.pipe(Layer.provideMerge(settingsLayer));
  const pacingLayer = PacingPolicy.layer.pipe(Layer.provideMerge(settingsLayer));
  const replicatorLayer = MemberReplicator.layer.pipe(Layer.provideMerge(pacingLayer));
  const migratorLayer = ListMigrator.layer.pipe(
    Layer.provideMerge(sessionLayer),
    Layer.provideMerge(fetcherLayer),
    Layer.provideMerge(ListCreator.layer),
    Layer.provideMerge(replicatorLayer)
  );

  return Layer.mergeAll(migratorLayer, credentialLayer);
};
