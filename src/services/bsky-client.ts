import { AtpAgent } from "@atproto/api";
import { Context, Effect, Layer, Redacted, Schema } from "effect";
import { AppConfigService, serviceFor } from "./app-config.js";
import { messageFromCause, xrpcDetails } from "./shared.js";
import type { AccountRole, BskyCredentials } from "../domain/credentials.js";
import { BskyError } from "../domain/errors.js";
import { ListMember, ListPage, RecordRef } from "../domain/list.js";
import { Did, type ListUri } from "../domain/primitives.js";

export interface ListPageOptions {
  readonly limit: number;
  readonly cursor?: string;
}

/**
 * An authenticated connection for one account. Writes always target the
 * session's own repository.
 */
export interface BskySession {
  readonly role: AccountRole;
  readonly did: Did;
  readonly handle: string;
  readonly service: string;
  readonly getListPage: (
    list: ListUri,
    options: ListPageOptions
  ) => Effect.Effect<ListPage, BskyError>;
  readonly createRecord: (
    collection: string,
    record: Record<string, unknown>
  ) => Effect.Effect<RecordRef, BskyError>;
}

const toBskyError = (message: string, operation: string) => (cause: unknown) =>
  BskyError.make({
    message: messageFromCause(message, cause),
    cause,
    operation,
    ...xrpcDetails(cause)
  });

const withCursor = <T extends Record<string, unknown>>(
  params: T,
  cursor: string | undefined
): T & { cursor?: string } =>
  typeof cursor === "string" && cursor.length > 0 ? { ...params, cursor } : params;

const SessionInfo = Schema.Struct({ did: Did, handle: Schema.String });

const ListItems = Schema.Array(
  Schema.Struct({
    subject: Schema.Struct({ did: Did, handle: Schema.optional(Schema.String) })
  })
);

const decodeSession = (data: unknown) =>
  Schema.decodeUnknown(SessionInfo)(data).pipe(
    Effect.mapError((cause) =>
      BskyError.make({
        message: "Invalid session payload",
        cause,
        operation: "createSession"
      })
    )
  );

const decodeListItems = (items: unknown) =>
  Schema.decodeUnknown(ListItems)(items).pipe(
    Effect.mapError((cause) =>
      BskyError.make({ message: "Invalid list item payload", cause, operation: "getList" })
    )
  );

export class BskyClient extends Context.Tag("@list-migrator/BskyClient")<
  BskyClient,
  {
    readonly login: (
      role: AccountRole,
      credentials: BskyCredentials
    ) => Effect.Effect<BskySession, BskyError>;
  }
>() {
  static readonly layer = Layer.effect(
    BskyClient,
    Effect.gen(function* () {
      const config = yield* AppConfigService;

      const login = (role: AccountRole, credentials: BskyCredentials) =>
        Effect.gen(function* () {
          const service = serviceFor(config, role);
          const agent = new AtpAgent({ service });
          const response = yield* Effect.tryPromise({
            try: () =>
              agent.login({
                identifier: credentials.identifier,
                password: Redacted.value(credentials.password)
              }),
            catch: toBskyError("Bluesky login failed", "createSession")
          });
          const { did, handle } = yield* decodeSession(response.data);

          const getListPage = (list: ListUri, options: ListPageOptions) =>
            Effect.gen(function* () {
              const params = withCursor({ list, limit: options.limit }, options.cursor);
              const page = yield* Effect.tryPromise({
                try: () => agent.app.bsky.graph.getList(params),
                catch: toBskyError("Failed to fetch list", "getList")
              });
              const items = yield* decodeListItems(page.data.items);
              const cursor = page.data.cursor;
              return ListPage.make({
                members: items.map((item) =>
                  ListMember.make({ subject: item.subject.did, handle: item.subject.handle })
                ),
                cursor: typeof cursor === "string" && cursor.length > 0 ? cursor : undefined
              });
            });

          const createRecord = (collection: string, record: Record<string, unknown>) =>
            Effect.tryPromise({
              try: () => agent.com.atproto.repo.createRecord({ repo: did, collection, record }),
              catch: toBskyError("Failed to create record", "createRecord")
            }).pipe(
              Effect.map((created) =>
                RecordRef.make({ uri: created.data.uri, cid: created.data.cid })
              )
            );

          const session: BskySession = {
            role,
            did,
            handle,
            service,
            getListPage,
            createRecord
          };
          return session;
        });

      return BskyClient.of({ login });
    })
  );
}
