import { Chunk, Match, Schema } from "effect";
import { BskyCredentials } from "./credentials.js";
import { ListRef, NewListSpec } from "./list.js";
import { Did, ListUri } from "./primitives.js";

export const MigrationPhase = Schema.Literal(
  "authenticate-source",
  "fetch-members",
  "authenticate-destination",
  "create-list",
  "replicate-members"
);
export type MigrationPhase = typeof MigrationPhase.Type;

export class MemberAdded extends Schema.TaggedClass<MemberAdded>()("Added", {
  uri: Schema.String
}) {}

export class MemberFailed extends Schema.TaggedClass<MemberFailed>()("Failed", {
  reason: Schema.String,
  status: Schema.optional(Schema.Number)
}) {}

export class MemberSkipped extends Schema.TaggedClass<MemberSkipped>()("Skipped", {
  reason: Schema.Literal("AlreadyPresent")
}) {}

export const MemberOutcome = Schema.Union(MemberAdded, MemberFailed, MemberSkipped);
export type MemberOutcome = typeof MemberOutcome.Type;

export class MemberFailure extends Schema.Class<MemberFailure>("MemberFailure")({
  index: Schema.Int,
  subject: Did,
  reason: Schema.String,
  status: Schema.optional(Schema.Number)
}) {}

export class MigrationResult extends Schema.Class<MigrationResult>("MigrationResult")({
  list: ListRef,
  membersFound: Schema.NonNegativeInt,
  membersAdded: Schema.NonNegativeInt,
  membersFailed: Schema.NonNegativeInt,
  membersSkipped: Schema.NonNegativeInt,
  failures: Schema.Array(MemberFailure)
}) {}

export class PhaseStarted extends Schema.TaggedClass<PhaseStarted>()("PhaseStarted", {
  phase: MigrationPhase
}) {}

export class PhaseCompleted extends Schema.TaggedClass<PhaseCompleted>()(
  "PhaseCompleted",
  {
    phase: MigrationPhase,
    detail: Schema.Record({ key: Schema.String, value: Schema.Unknown })
  }
) {}

export class MemberProcessed extends Schema.TaggedClass<MemberProcessed>()(
  "MemberProcessed",
  {
    index: Schema.Int,
    total: Schema.NonNegativeInt,
    subject: Did,
    outcome: MemberOutcome
  }
) {}

export class MigrationCompleted extends Schema.TaggedClass<MigrationCompleted>()(
  "MigrationCompleted",
  { result: MigrationResult }
) {}

export const MigrationEvent = Schema.Union(
  PhaseStarted,
  PhaseCompleted,
  MemberProcessed,
  MigrationCompleted
);
export type MigrationEvent = typeof MigrationEvent.Type;

export class MigrationRequest extends Schema.Class<MigrationRequest>("MigrationRequest")({
  source: BskyCredentials,
  sourceList: ListUri,
  destination: BskyCredentials,
  list: NewListSpec
}) {}

export type MigrationTally = {
  readonly added: number;
  readonly failed: number;
  readonly skipped: number;
  readonly failures: Chunk.Chunk<MemberFailure>;
};

export const emptyTally: MigrationTally = {
  added: 0,
  failed: 0,
  skipped: 0,
  failures: Chunk.empty()
};

/** Fold one processed member into running counts. */
export const tallyMember = (tally: MigrationTally, event: MemberProcessed): MigrationTally =>
  Match.value(event.outcome).pipe(
    Match.tagsExhaustive({
      Added: () => ({ ...tally, added: tally.added + 1 }),
      Skipped: () => ({ ...tally, skipped: tally.skipped + 1 }),
      Failed: (failed) => ({
        ...tally,
        failed: tally.failed + 1,
        failures: Chunk.append(
          tally.failures,
          MemberFailure.make({
            index: event.index,
            subject: event.subject,
            reason: failed.reason,
            status: failed.status
          })
        )
      })
    })
  );

export const resultFromTally = (list: ListRef, found: number, tally: MigrationTally) =>
  MigrationResult.make({
    list,
    membersFound: found,
    membersAdded: tally.added,
    membersFailed: tally.failed,
    membersSkipped: tally.skipped,
    failures: Chunk.toReadonlyArray(tally.failures)
  });
