import { Command, Options } from "@effect/cli";
import { FileSystem } from "@effect/platform";
import { Effect, Option, Schema } from "effect";
import { NewListSpec } from "../domain/list.js";
import { MigrationRequest } from "../domain/migration.js";
import { normalizeListReference } from "../domain/primitives.js";
import { ConfigOverrides } from "../services/app-config.js";
import { CredentialResolver } from "../services/credential-resolver.js";
import { decodeListUri } from "../services/list-fetcher.js";
import { ListMigrator } from "../services/list-migrator.js";
import { formatSchemaError, pickDefined } from "../services/shared.js";
import { toRoleCredentials } from "./config.js";
import { CliInputError } from "./errors.js";
import { withExamples } from "./help.js";
import { makeCliLayer } from "./layers.js";
import { makeMigrationLogger } from "./logging.js";
import { CliOutput } from "./output.js";

const sourceHandleOption = Options.text("source-handle").pipe(
  Options.optional,
  Options.withDescription("Handle or DID of the account that owns the source list")
);
const sourcePasswordOption = Options.redacted("source-password").pipe(
  Options.optional,
  Options.withDescription("App password for the source account (redacted)")
);
const sourceListOption = Options.text("source-list").pipe(
  Options.withDescription("Source list as at://... or https://bsky.app/profile/<did>/lists/<rkey>")
);
const destHandleOption = Options.text("dest-handle").pipe(
  Options.optional,
  Options.withDescription("Handle or DID of the account that receives the new list")
);
const destPasswordOption = Options.redacted("dest-password").pipe(
  Options.optional,
  Options.withDescription("App password for the destination account (redacted)")
);
const nameOption = Options.text("name").pipe(
  Options.withDescription("Name of the new list (1-64 characters)")
);
const purposeOption = Options.choice("purpose", ["curatelist", "modlist"]).pipe(
  Options.withDefault("curatelist" as const),
  Options.withDescription("List purpose")
);
const descriptionOption = Options.text("description").pipe(
  Options.optional,
  Options.withDescription("Description of the new list (up to 300 characters)")
);
const sourceServiceOption = Options.text("source-service").pipe(
  Options.optional,
  Options.withDescription("Service URL for the source account")
);
const destServiceOption = Options.text("dest-service").pipe(
  Options.optional,
  Options.withDescription("Service URL for the destination account")
);
const existingMembersOption = Options.choice("existing-members", ["duplicate", "skip"]).pipe(
  Options.optional,
  Options.withDescription("Write a subject again when it is already in the new list (default: duplicate)")
);
const pacingOption = Options.choice("pacing", ["fixed", "exponential"]).pipe(
  Options.optional,
  Options.withDescription("Delay strategy between member writes (default: fixed)")
);
const reportOption = Options.file("report").pipe(
  Options.optional,
  Options.withDescription("Also write the final result JSON to this file")
);
const quietOption = Options.boolean("quiet").pipe(
  Options.withDescription("Suppress per-member progress lines")
);

const decodeListSpec = (input: {
  readonly name: string;
  readonly purpose: "curatelist" | "modlist";
  readonly description: Option.Option<string>;
}) =>
  Schema.decodeUnknown(NewListSpec)(
    pickDefined({
      name: input.name,
      purpose: input.purpose,
      description: Option.getOrUndefined(input.description)
    })
  ).pipe(
    Effect.mapError((error) =>
      CliInputError.make({
        message: `Invalid list details: ${formatSchemaError(error)}`,
        cause: error
      })
    )
  );

export const migrateCommand = Command.make(
  "migrate",
  {
    sourceHandle: sourceHandleOption,
    sourcePassword: sourcePasswordOption,
    sourceList: sourceListOption,
    destHandle: destHandleOption,
    destPassword: destPasswordOption,
    name: nameOption,
    purpose: purposeOption,
    description: descriptionOption,
    sourceService: sourceServiceOption,
    destService: destServiceOption,
    existingMembers: existingMembersOption,
    pacing: pacingOption,
    report: reportOption,
    quiet: quietOption
  },
  (args) =>
    Effect.gen(function* () {
      const { _tag: _, ...globalConfig } = yield* ConfigOverrides;
      const layer = makeCliLayer({
        config: {
          ...globalConfig,
          ...pickDefined({
            sourceService: Option.getOrUndefined(args.sourceService),
            destinationService: Option.getOrUndefined(args.destService)
          })
        },
        credentials: {
          source: toRoleCredentials(args.sourceHandle, args.sourcePassword),
          destination: toRoleCredentials(args.destHandle, args.destPassword)
        },
        settings: pickDefined({
          pacing: Option.getOrUndefined(args.pacing),
          existingMembers: Option.getOrUndefined(args.existingMembers)
        })
      });

      const program = Effect.gen(function* () {
        const credentials = yield* CredentialResolver;
        const source = yield* credentials.require("source");
        const destination = yield* credentials.require("destination");
        const sourceList = yield* decodeListUri(normalizeListReference(args.sourceList));
        const list = yield* decodeListSpec(args);

        const output = yield* CliOutput;
        const onEvent = yield* makeMigrationLogger(args.quiet, output);
        const migrator = yield* ListMigrator;
        const result = yield* migrator.run(
          MigrationRequest.make({ source, sourceList, destination, list }),
          onEvent
        );

        yield* output.writeJson(result);
        if (Option.isSome(args.report)) {
          const fs = yield* FileSystem.FileSystem;
          yield* fs.writeFileString(args.report.value, `${JSON.stringify(result, null, 2)}\n`);
        }
      });

      yield* program.pipe(Effect.provide(layer));
    })
).pipe(
  Command.withDescription(
    withExamples(
      "Copy a list and all of its members into a new list on another account",
      [
        "list-migrator migrate --source-handle alice.bsky.social --source-list at://did:plc:abc/app.bsky.graph.list/3kxyz --dest-handle bob.bsky.social --name \"Copy\"",
        "list-migrator migrate --source-list https://bsky.app/profile/did:plc:abc/lists/3kxyz --name Mods --purpose modlist --report result.json"
      ],
      [
        "Passwords are read from LIST_MIGRATOR_SOURCE_PASSWORD and LIST_MIGRATOR_DEST_PASSWORD when the flags are omitted.",
        "Members that fail to copy are reported in the result; the run continues."
      ]
    )
  )
);
