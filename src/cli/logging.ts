import { Terminal } from "@effect/platform";
import { Effect, Match, Option } from "effect";
import type { LogFormat } from "../domain/config.js";
import type { MemberProcessed, MigrationEvent } from "../domain/migration.js";
import { AppConfigService } from "../services/app-config.js";
import type { CliOutputService } from "./output.js";
import { CliOutput } from "./output.js";
import { CliPreferences } from "./preferences.js";

export type LogLevel = "INFO" | "WARN" | "ERROR" | "PROGRESS";

export type LogEntry = {
  readonly level: LogLevel;
  readonly payload: Record<string, unknown>;
};

const nowIso = () => new Date().toISOString();

const encodeLog = (level: LogLevel, payload: Record<string, unknown>) =>
  JSON.stringify({
    timestamp: nowIso(),
    level,
    ...payload
  });

const isMemberProgress = (payload: Record<string, unknown>) =>
  typeof payload.index === "number" &&
  typeof payload.total === "number" &&
  typeof payload.subject === "string";

export const formatHuman = (level: LogLevel, payload: Record<string, unknown>) => {
  if (level === "PROGRESS" && isMemberProgress(payload)) {
    const outcome = typeof payload.outcome === "string" ? ` ${payload.outcome}` : "";
    return `[PROGRESS] ${String(payload.index)}/${String(payload.total)} ${String(payload.subject)}${outcome}`;
  }

  const message =
    typeof payload.message === "string" && payload.message.length > 0
      ? payload.message
      : "";
  const rest = { ...payload };
  delete rest.message;
  const suffix = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  const base = `[${level}]${message ? ` ${message}` : ""}`;
  return `${base}${suffix}`.trim();
};

export const encodeLogFormat = (
  format: LogFormat,
  level: LogLevel,
  payload: Record<string, unknown>
) => (format === "human" ? formatHuman(level, payload) : encodeLog(level, payload));

/** --log-format, then the configured format, then human on a TTY and JSON otherwise. */
const resolveLogFormat = Effect.gen(function* () {
  const preferences = yield* Effect.serviceOption(CliPreferences);
  const override = Option.flatMap(preferences, (value) =>
    Option.fromNullable(value.logFormat)
  );
  if (Option.isSome(override)) {
    return override.value;
  }
  const config = yield* Effect.serviceOption(AppConfigService);
  const configured = Option.flatMap(config, (value) => Option.fromNullable(value.logFormat));
  if (Option.isSome(configured)) {
    return configured.value;
  }
  const terminal = yield* Effect.serviceOption(Terminal.Terminal);
  if (Option.isSome(terminal)) {
    const isTTY = yield* terminal.value.isTTY.pipe(Effect.orElseSucceed(() => false));
    return isTTY ? "human" : "json";
  }
  return "json" as const;
});

const logEventWith = (
  output: CliOutputService,
  format: LogFormat,
  level: LogLevel,
  payload: Record<string, unknown>
) => output.writeStderr(encodeLogFormat(format, level, payload));

const logEvent = (level: LogLevel, payload: Record<string, unknown>) =>
  Effect.gen(function* () {
    const output = yield* CliOutput;
    const format = yield* resolveLogFormat;
    yield* logEventWith(output, format, level, payload);
  });

export const logErrorEvent = (message: string, data?: Record<string, unknown>) =>
  logEvent("ERROR", { message, ...data });

const memberEntry = (event: MemberProcessed): LogEntry => {
  const position = { index: event.index, total: event.total, subject: event.subject };
  return Match.value(event.outcome).pipe(
    Match.tagsExhaustive({
      Added: (added) => ({
        level: "PROGRESS" as const,
        payload: { ...position, outcome: "added", uri: added.uri }
      }),
      Skipped: (skipped) => ({
        level: "PROGRESS" as const,
        payload: { ...position, outcome: "skipped", reason: skipped.reason }
      }),
      Failed: (failed) => ({
        level: "WARN" as const,
        payload: {
          message: "Failed to add member",
          ...position,
          reason: failed.reason,
          ...(failed.status !== undefined ? { status: failed.status } : {})
        }
      })
    })
  );
};

/** The one log line each migration event maps to. */
export const migrationLogEntry = (event: MigrationEvent): LogEntry =>
  Match.value(event).pipe(
    Match.tagsExhaustive({
      PhaseStarted: (started) => ({
        level: "INFO" as const,
        payload: { message: `Starting ${started.phase}`, phase: started.phase }
      }),
      PhaseCompleted: (completed) => ({
        level: "INFO" as const,
        payload: {
          message: `Completed ${completed.phase}`,
          phase: completed.phase,
          ...completed.detail
        }
      }),
      MemberProcessed: memberEntry,
      MigrationCompleted: ({ result }) => ({
        level: "INFO" as const,
        payload: {
          message: "Migration completed",
          list: result.list.uri,
          membersFound: result.membersFound,
          membersAdded: result.membersAdded,
          membersFailed: result.membersFailed,
          membersSkipped: result.membersSkipped
        }
      })
    })
  );

/**
 * Event handler for ListMigrator.run. With `quiet`, PROGRESS lines are
 * dropped; warnings and phase lines are always written. Log write failures
 * never fail the migration.
 */
export const makeMigrationLogger = (quiet: boolean, output: CliOutputService) =>
  Effect.gen(function* () {
    const format = yield* resolveLogFormat;
    return (event: MigrationEvent) => {
      const entry = migrationLogEntry(event);
      if (quiet && entry.level === "PROGRESS") {
        return Effect.void;
      }
      return logEventWith(output, format, entry.level, entry.payload).pipe(
        Effect.orElseSucceed(() => undefined)
      );
    };
  });
