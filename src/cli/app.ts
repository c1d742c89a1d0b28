import { Command } from "@effect/cli";
import { Layer, Option } from "effect";
import { ConfigOverrides } from "../services/app-config.js";
import { configOptions, toConfigOverrides } from "./config.js";
import { withExamples } from "./help.js";
import { membersCommand } from "./members.js";
import { migrateCommand } from "./migrate.js";
import { CliOutput } from "./output.js";
import { CliPreferences } from "./preferences.js";

export const app = Command.make("list-migrator", configOptions).pipe(
  Command.withSubcommands([migrateCommand, membersCommand]),
  Command.provide((config) =>
    Layer.mergeAll(
      CliOutput.layer,
      Layer.succeed(ConfigOverrides, ConfigOverrides.make(toConfigOverrides(config))),
      Layer.succeed(
        CliPreferences,
        Option.match(config.logFormat, {
          onNone: () => ({}),
          onSome: (logFormat) => ({ logFormat })
        })
      )
    )
  ),
  Command.withDescription(
    withExamples(
      "Copy Bluesky lists between accounts",
      [
        "list-migrator members at://did:plc:abc/app.bsky.graph.list/3kxyz --format table",
        "list-migrator --log-format human migrate --source-list at://did:plc:abc/app.bsky.graph.list/3kxyz --name Copy"
      ],
      ["Log events go to stderr; results go to stdout as JSON."]
    )
  )
);
