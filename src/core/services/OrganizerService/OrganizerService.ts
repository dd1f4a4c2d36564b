/**
 * OrganizerService - one scan session over a source directory.
 *
 *   Init         validate the source directory (fail fast, nothing created)
 *   Enumerating  single listing pass; files named like a category folder are moved
 *                first, the other admitted entries are submitted as they are found
 *   Draining     close the pool, wait for completion up to the deadline
 *   Done         aggregate Outcomes into a ScanReport
 *
 * Locks, executor and pool all live in the session's Scope and are discarded with it.
 */

import { Context, Data, Duration, Effect, Layer, Match, Option, pipe } from "effect";
import { join, resolve } from "node:path";
import { FileOpsServiceTag, type FileOpError } from "@services/FileOpsService";
import { describeFileOpError, makeMoveExecutor } from "@services/MoveExecutor";
import { admitEntry } from "@services/ScanFilter";
import type { CategoryMapping } from "@domain/CategoryMapping";
import type { OrganizeEventHandler } from "@domain/OrganizeEvent";
import { Outcome, countOutcomes } from "@domain/Outcome";
import { makeWorkItem, type WorkItem } from "@domain/WorkItem";
import { makeKeyedLock } from "@lib/KeyedLock";
import { makeWorkerPool } from "@lib/WorkerPool";

// =============================================================================
// Service errors
// =============================================================================

export type InvalidSourceReason = "NotFound" | "NotADirectory" | "PermissionDenied" | "Unreadable";

export class InvalidSourceDirectory extends Data.TaggedError("InvalidSourceDirectory")<{
  readonly path: string;
  readonly reason: InvalidSourceReason;
  readonly detail: string;
}> {}

export class ScanFailed extends Data.TaggedError("ScanFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export class ScanInterrupted extends Data.TaggedError("ScanInterrupted")<{
  readonly path: string;
  readonly submitted: number;
  readonly moved: number;
  readonly failed: number;
  readonly skipped: number;
}> {}

export type OrganizerError = InvalidSourceDirectory | ScanFailed | ScanInterrupted;

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_TIMEOUT: Duration.Duration = Duration.seconds(60);

export interface OrganizeOptions {
  readonly concurrency?: number;
  /** How long to wait for the workers once enumeration is done. */
  readonly timeout?: Duration.DurationInput;
  readonly onEvent?: OrganizeEventHandler;
  /** Completes when the caller wants the scan stopped. The scan then fails with ScanInterrupted. */
  readonly interrupt?: Effect.Effect<void>;
}

export interface ScanReport {
  readonly sourceDirectory: string;
  /** Files handed to the workers; the total reported to the user. */
  readonly submitted: number;
  readonly moved: number;
  readonly skipped: number;
  readonly failed: number;
  readonly timedOut: boolean;
  readonly outcomes: ReadonlyArray<Outcome>;
}

// =============================================================================
// Service interface
// =============================================================================

export interface OrganizerService {
  readonly organize: (
    sourceDirectory: string,
    mapping: CategoryMapping,
    options?: OrganizeOptions
  ) => Effect.Effect<ScanReport, OrganizerError>;
}

export class OrganizerServiceTag extends Context.Tag("OrganizerService")<
  OrganizerServiceTag,
  OrganizerService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

const toInvalidSource = (path: string) =>
  Match.typeTags<FileOpError>()({
    FileOpNotFound: (e) =>
      new InvalidSourceDirectory({ path, reason: "NotFound", detail: describeFileOpError(e) }),
    FileOpPermissionDenied: (e) =>
      new InvalidSourceDirectory({ path, reason: "PermissionDenied", detail: describeFileOpError(e) }),
    FileOpNotADirectory: (e) =>
      new InvalidSourceDirectory({ path, reason: "NotADirectory", detail: describeFileOpError(e) }),
    FileOpAlreadyExists: (e) =>
      new InvalidSourceDirectory({ path, reason: "Unreadable", detail: describeFileOpError(e) }),
    FileOpCrossDevice: (e) =>
      new InvalidSourceDirectory({ path, reason: "Unreadable", detail: describeFileOpError(e) }),
    FileOpFailed: (e) =>
      new InvalidSourceDirectory({ path, reason: "Unreadable", detail: describeFileOpError(e) })
  });

/** Lower-cased names of every folder a file of this mapping can be moved into. */
const categoryFolderNames = (mapping: CategoryMapping): ReadonlySet<string> =>
  new Set([mapping.defaultCategory, ...mapping.entries.map(([, category]) => category)].map((c) => c.toLowerCase()));

type Ending = "Completed" | "TimedOut" | "Interrupted";

const abandonedOutcome = (item: WorkItem, ending: Ending): Outcome =>
  Outcome.Skipped({
    sourcePath: item.sourcePath,
    reason: ending === "TimedOut" ? "not started before the timeout" : "not started before the scan was interrupted"
  });

export const OrganizerServiceLive = Layer.effect(
  OrganizerServiceTag,
  Effect.gen(function* () {
    const ops = yield* FileOpsServiceTag;

    const validateSource = (path: string): Effect.Effect<void, InvalidSourceDirectory> =>
      pipe(
        ops.stat(path),
        Effect.mapError(toInvalidSource(path)),
        Effect.flatMap(({ kind }) =>
          kind === "Directory"
            ? Effect.void
            : Effect.fail(
                new InvalidSourceDirectory({
                  path,
                  reason: "NotADirectory",
                  detail: `${path} is not a directory`
                })
              )
        )
      );

    const organize: OrganizerService["organize"] = (sourceDirectory, mapping, options = {}) => {
      const baseDirectory = resolve(sourceDirectory);
      const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
      const timeout = options.timeout ?? DEFAULT_TIMEOUT;
      const interrupt = options.interrupt ?? Effect.never;

      return pipe(
        Effect.gen(function* () {
          yield* validateSource(baseDirectory);

          const locks = yield* makeKeyedLock;
          const executor = yield* makeMoveExecutor({ mapping, locks, onEvent: options.onEvent });
          const pool = yield* makeWorkerPool({ concurrency, process: executor.execute });

          const names = yield* pipe(
            ops.list(baseDirectory),
            Effect.mapError((e) => new ScanFailed({ path: baseDirectory, reason: describeFileOpError(e) }))
          );

          const admit = (name: string): Effect.Effect<Option.Option<WorkItem>, never, FileOpsServiceTag> =>
            Effect.map(admitEntry(baseDirectory, name), (admitted) =>
              admitted ? Option.some(makeWorkItem(join(baseDirectory, name), baseDirectory)) : Option.none()
            );

          // A file where a category folder belongs would make every move into that
          // category fail, so it is moved out of the way before any worker starts.
          const folderNames = categoryFolderNames(mapping);
          const isFolderName = (name: string) => folderNames.has(name.toLowerCase());

          const blocking = yield* Effect.forEach(names.filter(isFolderName), admit);
          const clearedOutcomes = yield* Effect.forEach(blocking.flatMap((item) => Option.toArray(item)), executor.execute);

          yield* Effect.forEach(
            names.filter((name) => !isFolderName(name)),
            (name) =>
              pipe(
                admit(name),
                Effect.flatMap(Option.match({ onNone: () => Effect.void, onSome: pool.submit }))
              ),
            { discard: true }
          );

          yield* pool.close;

          const ending: Ending = yield* pipe(
            Effect.raceFirst(
              pipe(
                pool.await(timeout),
                Effect.map((finished): Ending => (finished ? "Completed" : "TimedOut"))
              ),
              pipe(interrupt, Effect.as<Ending>("Interrupted"))
            ),
            Effect.onInterrupt(() =>
              pipe(
                Effect.all([pool.submitted, pool.results]),
                Effect.flatMap(([submitted, results]) =>
                  Effect.logWarning(
                    `Scan of ${baseDirectory} interrupted: ${results.length} of ${submitted} files completed`
                  )
                )
              )
            )
          );

          const abandoned: ReadonlyArray<WorkItem> = ending === "Completed" ? [] : yield* pool.cancel;
          const submitted = clearedOutcomes.length + (yield* pool.submitted);
          const outcomes: ReadonlyArray<Outcome> = [
            ...clearedOutcomes,
            ...(yield* pool.results),
            ...abandoned.map((item) => abandonedOutcome(item, ending))
          ];
          const counts = countOutcomes(outcomes);

          if (ending === "Interrupted") {
            return yield* Effect.fail(new ScanInterrupted({ path: baseDirectory, submitted, ...counts }));
          }

          if (ending === "TimedOut") {
            yield* Effect.logWarning(
              `${abandoned.length} of ${submitted} files did not complete within ${Duration.format(timeout)}`
            );
          }

          return {
            sourceDirectory: baseDirectory,
            submitted,
            ...counts,
            timedOut: ending === "TimedOut",
            outcomes
          } satisfies ScanReport;
        }),
        Effect.scoped,
        Effect.provideService(FileOpsServiceTag, ops)
      );
    };

    return { organize };
  })
);
