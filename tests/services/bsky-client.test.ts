import { describe, expect, test } from "vitest";
import { ConfigProvider, Effect, Layer, Redacted } from "effect";
import { NodeContext } from "@effect/platform-node";
import { AppConfigService } from "../../src/services/app-config.js";
import { BskyClient } from "../../src/services/bsky-client.js";
import { BskyCredentials } from "../../src/domain/credentials.js";
import { ListUri } from "../../src/domain/primitives.js";
import {
  makeBskyMockLayer,
  type MockRequestLog,
  type MockServerState
} from "../support/bsky-mock-server.js";

const listUri = ListUri.make("at://did:plc:AAA/app.bsky.graph.list/abc");

const baseState: MockServerState = {
  accounts: [
    { identifier: "alice.test", password: "test-secret", did: "did:plc:AAA", handle: "alice.test" },
    { identifier: "bob.test", password: "test-secret-2", did: "did:plc:BBB", handle: "bob.test" }
  ],
  lists: {
    [listUri]: [
      { did: "did:plc:X", handle: "x.test" },
      { did: "did:plc:Y", handle: "y.test" },
      { did: "did:plc:Z", handle: "z.test" }
    ]
  }
};

const credentials = (identifier: string, password: string) =>
  BskyCredentials.make({ identifier, password: Redacted.make(password) });

const clientLayer = (state: MockServerState, log: Array<MockRequestLog>) =>
  BskyClient.layer.pipe(
    Layer.provide(AppConfigService.layer),
    Layer.provide(makeBskyMockLayer(state, log)),
    Layer.provide(NodeContext.layer),
    Layer.provide(Layer.setConfigProvider(ConfigProvider.fromMap(new Map())))
  );

const run = <A, E>(
  program: Effect.Effect<A, E, BskyClient>,
  state: MockServerState = baseState,
  log: Array<MockRequestLog> = []
) => Effect.runPromise(program.pipe(Effect.provide(clientLayer(state, log))));

describe("BskyClient", () => {
  test("login opens a session for the account", async () => {
    const log: Array<MockRequestLog> = [];
    const session = await run(
      Effect.flatMap(BskyClient, (client) =>
        client.login("source", credentials("alice.test", "test-secret"))
      ),
      baseState,
      log
    );
    expect(session.did).toBe("did:plc:AAA");
    expect(session.handle).toBe("alice.test");
    expect(session.role).toBe("source");
    expect(session.service).toBe("https://bsky.test");
    expect(log.map((entry) => entry.route)).toEqual(["com.atproto.server.createSession"]);
  });

  test("getListPage passes limit and cursor and decodes members", async () => {
    const log: Array<MockRequestLog> = [];
    const [first, second] = await run(
      Effect.gen(function* () {
        const client = yield* BskyClient;
        const session = yield* client.login("source", credentials("alice.test", "test-secret"));
        const first = yield* session.getListPage(listUri, { limit: 2 });
        const second = yield* session.getListPage(listUri, { limit: 2, cursor: first.cursor });
        return [first, second] as const;
      }),
      baseState,
      log
    );

    expect(first.members.map((member) => member.subject)).toEqual(["did:plc:X", "did:plc:Y"]);
    expect(first.members[0]?.handle).toBe("x.test");
    expect(first.cursor).toBe("2");
    expect(second.members.map((member) => member.subject)).toEqual(["did:plc:Z"]);
    expect(second.cursor).toBeUndefined();

    const pages = log.filter((entry) => entry.route === "app.bsky.graph.getList");
    expect(pages.map((entry) => entry.query)).toEqual([
      { list: listUri, limit: "2" },
      { list: listUri, limit: "2", cursor: "2" }
    ]);
  });

  test("createRecord writes to the session's own repository", async () => {
    const log: Array<MockRequestLog> = [];
    const created = await run(
      Effect.gen(function* () {
        const client = yield* BskyClient;
        const session = yield* client.login("destination", credentials("bob.test", "test-secret-2"));
        return yield* session.createRecord("app.bsky.graph.list", {
          $type: "app.bsky.graph.list",
          name: "Copy",
          purpose: "app.bsky.graph.defs#curatelist",
          createdAt: "2024-01-01T00:00:00.000Z"
        });
      }),
      baseState,
      log
    );

    expect(created.uri).toBe("at://did:plc:BBB/app.bsky.graph.list/rkey1");
    const write = log.find((entry) => entry.route === "com.atproto.repo.createRecord");
    expect(write?.authorization).toBe("Bearer access-did:plc:BBB");
    expect(write?.body).toEqual({
      repo: "did:plc:BBB",
      collection: "app.bsky.graph.list",
      record: {
        $type: "app.bsky.graph.list",
        name: "Copy",
        purpose: "app.bsky.graph.defs#curatelist",
        createdAt: "2024-01-01T00:00:00.000Z"
      }
    });
  });

  test("sessions for two accounts never share tokens", async () => {
    const log: Array<MockRequestLog> = [];
    await run(
      Effect.gen(function* () {
        const client = yield* BskyClient;
        const source = yield* client.login("source", credentials("alice.test", "test-secret"));
        const destination = yield* client.login(
          "destination",
          credentials("bob.test", "test-secret-2")
        );
        yield* destination.createRecord("app.bsky.graph.listitem", { subject: "did:plc:X" });
        yield* source.createRecord("app.bsky.graph.listitem", { subject: "did:plc:Y" });
      }),
      baseState,
      log
    );

    const writes = log.filter((entry) => entry.route === "com.atproto.repo.createRecord");
    expect(writes.map((entry) => entry.authorization)).toEqual([
      "Bearer access-did:plc:BBB",
      "Bearer access-did:plc:AAA"
    ]);
  });

  test("rejected logins carry the HTTP status and error name", async () => {
    const error = await run(
      Effect.flip(
        Effect.flatMap(BskyClient, (client) =>
          client.login("source", credentials("alice.test", "wrong"))
        )
      )
    );
    expect(error._tag).toBe("BskyError");
    expect(error.operation).toBe("createSession");
    expect(error.status).toBe(401);
    expect(error.error).toBe("AuthenticationRequired");
  });

  test("server errors on getList carry the status", async () => {
    const error = await run(
      Effect.flip(
        Effect.gen(function* () {
          const client = yield* BskyClient;
          const session = yield* client.login("source", credentials("alice.test", "test-secret"));
          return yield* session.getListPage(listUri, { limit: 100 });
        })
      ),
      { ...baseState, failures: { getList: { status: 502, error: "UpstreamFailure" } } }
    );
    expect(error.operation).toBe("getList");
    expect(error.status).toBe(502);
  });

  test("dropped connections have no status", async () => {
    const error = await run(
      Effect.flip(
        Effect.flatMap(BskyClient, (client) =>
          client.login("source", credentials("alice.test", "test-secret"))
        )
      ),
      { ...baseState, failures: { createSession: { network: true } } }
    );
    expect(error.operation).toBe("createSession");
    expect(error.status).toBeUndefined();
  });
});
