import { Args, Command, Options } from "@effect/cli";
import { Effect, Stream } from "effect";
import type { ListMember } from "../domain/list.js";
import { normalizeListReference } from "../domain/primitives.js";
import { ConfigOverrides } from "../services/app-config.js";
import { CredentialResolver } from "../services/credential-resolver.js";
import { ListFetcher } from "../services/list-fetcher.js";
import { SessionManager } from "../services/session-manager.js";
import { toRoleCredentials } from "./config.js";
import { renderTable } from "./doc/table.js";
import { withExamples } from "./help.js";
import { makeCliLayer } from "./layers.js";
import { emitWithFormat, jsonNdjsonTableFormats } from "./output-format.js";
import { writeJson, writeJsonStream, writeText } from "./output.js";

const listArg = Args.text({ name: "list" }).pipe(
  Args.withDescription("List as at://... or https://bsky.app/profile/<did>/lists/<rkey>")
);

const handleOption = Options.text("handle").pipe(
  Options.optional,
  Options.withDescription("Handle or DID to log in with (default: LIST_MIGRATOR_SOURCE_HANDLE)")
);
const passwordOption = Options.redacted("password").pipe(
  Options.optional,
  Options.withDescription("App password (redacted, default: LIST_MIGRATOR_SOURCE_PASSWORD)")
);
const ansiOption = Options.boolean("ansi").pipe(
  Options.withDescription("Color the table output")
);
const formatOption = Options.choice("format", jsonNdjsonTableFormats).pipe(
  Options.optional,
  Options.withDescription("Output format (default: json)")
);

export const renderMembersTable = (members: ReadonlyArray<ListMember>, ansi = false) =>
  members.length === 0
    ? "No members."
    : renderTable(
        {
          headers: ["#", "DID", "HANDLE"],
          rows: members.map((member, index) => [
            String(index + 1),
            member.subject,
            member.handle ?? "-"
          ]),
          styles: ["dim", "accent", "value"]
        },
        ansi
      );

export const membersCommand = Command.make(
  "members",
  {
    list: listArg,
    handle: handleOption,
    password: passwordOption,
    format: formatOption,
    ansi: ansiOption
  },
  ({ list, handle, password, format, ansi }) =>
    Effect.gen(function* () {
      const { _tag: _, ...globalConfig } = yield* ConfigOverrides;
      const layer = makeCliLayer({
        config: globalConfig,
        credentials: { source: toRoleCredentials(handle, password) },
        settings: {}
      });

      const program = Effect.gen(function* () {
        const credentials = yield* CredentialResolver.pipe(
          Effect.flatMap((resolver) => resolver.require("source"))
        );
        const sessions = yield* SessionManager;
        const fetcher = yield* ListFetcher;
        const session = yield* sessions.authenticate("source", credentials);
        const reference = normalizeListReference(list);
        const members = yield* fetcher.fetchMembers(session, reference);

        yield* emitWithFormat(format, "json", {
          json: writeJson({ list: reference, count: members.length, members }),
          ndjson: writeJsonStream(Stream.fromIterable(members)),
          table: writeText(renderMembersTable(members, ansi))
        });
      });

      yield* program.pipe(Effect.provide(layer));
    })
).pipe(
  Command.withDescription(
    withExamples("Print the members of a list, in the order migrate would copy them", [
      "list-migrator members at://did:plc:abc/app.bsky.graph.list/3kxyz --format table --ansi"
    ])
  )
);
