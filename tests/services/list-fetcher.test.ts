import { describe, expect, test } from "vitest";
import { Chunk, Effect, Fiber, Layer, Stream, TestClock, TestContext } from "effect";
import { BskyError } from "../../src/domain/errors.js";
import { BskyClient } from "../../src/services/bsky-client.js";
import { classifyFetchFailure, ListFetcher } from "../../src/services/list-fetcher.js";
import { MigrationSettings } from "../../src/services/migration-settings.js";
import { alice, credentialsFor, FakeBsky, type FakeBskyOptions } from "../support/fake-bsky.js";

const listUri = "at://did:plc:AAA/app.bsky.graph.list/abc";

const dids = (count: number) => Array.from({ length: count }, (_, i) => `did:plc:m${i + 1}`);

const setup = (
  members: ReadonlyArray<string>,
  options: Partial<FakeBskyOptions> = {},
  settings: { readonly pageSize?: number; readonly pageDelayMs?: number } = {}
) => {
  const fake = new FakeBsky({ accounts: [alice], lists: { [listUri]: members }, ...options });
  const layer = Layer.mergeAll(
    ListFetcher.layer.pipe(Layer.provide(MigrationSettings.make({ pageSize: 2, ...settings }))),
    fake.layer
  );
  return { fake, layer };
};

const fetchMembers = (list: string) =>
  Effect.gen(function* () {
    const client = yield* BskyClient;
    const fetcher = yield* ListFetcher;
    const session = yield* client.login("source", credentialsFor(alice));
    return yield* fetcher.fetchMembers(session, list);
  });

describe("ListFetcher", () => {
  test.each([
    [0, 1],
    [1, 1],
    [2, 1],
    [3, 2],
    [7, 4]
  ])("a list of %i members takes %i page requests", async (count, requests) => {
    const expected = dids(count);
    const { fake, layer } = setup(expected);
    const members = await Effect.runPromise(fetchMembers(listUri).pipe(Effect.provide(layer)));
    expect(members.map((member) => member.subject)).toEqual(expected);
    expect(fake.pages).toHaveLength(requests);
  });

  test("follows cursors page by page with the configured limit", async () => {
    const { fake, layer } = setup(dids(5));
    await Effect.runPromise(fetchMembers(listUri).pipe(Effect.provide(layer)));
    expect(fake.pages.map((page) => [page.limit, page.cursor])).toEqual([
      [2, undefined],
      [2, "2"],
      [2, "4"]
    ]);
  });

  test("pauses between pages but not before the first", async () => {
    const { fake, layer } = setup(dids(5), {}, { pageDelayMs: 100 });
    await Effect.runPromise(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(fetchMembers(listUri));
        yield* TestClock.adjust("1 second");
        yield* Fiber.join(fiber);
      }).pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext))
    );
    expect(fake.pages.map((page) => page.at)).toEqual([0, 100, 200]);
  });

  test("the stream is lazy and restarts from the first page", async () => {
    const { fake, layer } = setup(dids(3));
    const [first, second] = await Effect.runPromise(
      Effect.gen(function* () {
        const client = yield* BskyClient;
        const fetcher = yield* ListFetcher;
        const session = yield* client.login("source", credentialsFor(alice));
        const stream = fetcher.fetchAllMembers(session, listUri);
        const first = yield* Stream.runCollect(Stream.take(stream, 1));
        const second = yield* Stream.runCollect(stream);
        return [Chunk.size(first), Chunk.size(second)] as const;
      }).pipe(Effect.provide(layer))
    );
    expect(first).toBe(1);
    expect(second).toBe(3);
    expect(fake.pages.map((page) => page.cursor)).toEqual([undefined, undefined, "2"]);
  });

  test("malformed references fail as InvalidRef without a request", async () => {
    const { fake, layer } = setup(dids(1));
    const error = await Effect.runPromise(
      Effect.flip(fetchMembers("https://example.com/list")).pipe(Effect.provide(layer))
    );
    expect(error.kind).toBe("InvalidRef");
    expect(error.list).toBe("https://example.com/list");
    expect(fake.pages).toEqual([]);
  });

  test("unknown lists fail as NotFound", async () => {
    const { layer } = setup(dids(1));
    const error = await Effect.runPromise(
      Effect.flip(fetchMembers("at://did:plc:AAA/app.bsky.graph.list/missing")).pipe(
        Effect.provide(layer)
      )
    );
    expect(error.kind).toBe("NotFound");
    expect(error.status).toBe(404);
  });

  test("a failure on a later page fails the whole fetch", async () => {
    const { fake, layer } = setup(dids(5), {
      pageError: (page) =>
        page === 2 ? BskyError.make({ message: "Internal Server Error", status: 500 }) : undefined
    });
    const error = await Effect.runPromise(
      Effect.flip(fetchMembers(listUri)).pipe(Effect.provide(layer))
    );
    expect(error._tag).toBe("FetchError");
    expect(error.kind).toBe("Transient");
    expect(error.status).toBe(500);
    expect(fake.pages).toHaveLength(2);
  });
});

describe("classifyFetchFailure", () => {
  test("400 InvalidRequest is an invalid reference", () => {
    expect(
      classifyFetchFailure(
        BskyError.make({ message: "bad", status: 400, error: "InvalidRequest" })
      )
    ).toBe("InvalidRef");
  });

  test("not-found error names win over the status", () => {
    expect(
      classifyFetchFailure(BskyError.make({ message: "gone", status: 400, error: "NotFound" }))
    ).toBe("NotFound");
  });

  test("rate limits and transport failures are transient", () => {
    expect(classifyFetchFailure(BskyError.make({ message: "slow down", status: 429 }))).toBe(
      "Transient"
    );
    expect(classifyFetchFailure(BskyError.make({ message: "fetch failed" }))).toBe("Transient");
  });
});
