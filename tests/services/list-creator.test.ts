import { describe, expect, test } from "vitest";
import { Effect, Layer } from "effect";
import { BskyError } from "../../src/domain/errors.js";
import { NewListSpec } from "../../src/domain/list.js";
import { BskyClient } from "../../src/services/bsky-client.js";
import { ListCreator } from "../../src/services/list-creator.js";
import { bob, credentialsFor, FakeBsky, type FakeBskyOptions, validCid } from "../support/fake-bsky.js";

const setup = (options: Partial<FakeBskyOptions> = {}) => {
  const fake = new FakeBsky({ accounts: [bob], ...options });
  return { fake, layer: Layer.mergeAll(ListCreator.layer, fake.layer) };
};

const createList = (spec: NewListSpec) =>
  Effect.gen(function* () {
    const client = yield* BskyClient;
    const creator = yield* ListCreator;
    const session = yield* client.login("destination", credentialsFor(bob));
    return yield* creator.createList(session, spec);
  });

describe("ListCreator", () => {
  test("writes one list record to the destination repository", async () => {
    const { fake, layer } = setup();
    const ref = await Effect.runPromise(
      createList(NewListSpec.make({ name: "Copy", purpose: "curatelist" })).pipe(
        Effect.provide(layer)
      )
    );

    expect(ref.uri).toBe("at://did:plc:BBB/app.bsky.graph.list/rkey1");
    expect(ref.cid).toBe(validCid);
    expect(fake.records).toHaveLength(1);
    const [call] = fake.records;
    expect(call?.repo).toBe("did:plc:BBB");
    expect(call?.collection).toBe("app.bsky.graph.list");
    expect(call?.record).toEqual({
      $type: "app.bsky.graph.list",
      name: "Copy",
      purpose: "app.bsky.graph.defs#curatelist",
      createdAt: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/)
    });
  });

  test("includes the description when given", async () => {
    const { fake, layer } = setup();
    await Effect.runPromise(
      createList(
        NewListSpec.make({ name: "Mods", purpose: "modlist", description: "Copied moderation list" })
      ).pipe(Effect.provide(layer))
    );
    expect(fake.records[0]?.record.purpose).toBe("app.bsky.graph.defs#modlist");
    expect(fake.records[0]?.record.description).toBe("Copied moderation list");
  });

  test("a rejected record is a Validation error and is not retried", async () => {
    const { fake, layer } = setup({
      recordError: () =>
        BskyError.make({ message: "Record/name must be a string", status: 400, error: "InvalidRequest" })
    });
    const error = await Effect.runPromise(
      Effect.flip(createList(NewListSpec.make({ name: "Copy", purpose: "curatelist" }))).pipe(
        Effect.provide(layer)
      )
    );
    expect(error._tag).toBe("CreateError");
    expect(error.kind).toBe("Validation");
    expect(error.status).toBe(400);
    expect(fake.records).toHaveLength(1);
  });

  test("server errors are Transient", async () => {
    const { fake, layer } = setup({
      recordError: () => BskyError.make({ message: "Bad Gateway", status: 502 })
    });
    const error = await Effect.runPromise(
      Effect.flip(createList(NewListSpec.make({ name: "Copy", purpose: "curatelist" }))).pipe(
        Effect.provide(layer)
      )
    );
    expect(error.kind).toBe("Transient");
    expect(error.message).toBe('Failed to create list "Copy": Bad Gateway');
    expect(fake.records).toHaveLength(1);
  });
});
