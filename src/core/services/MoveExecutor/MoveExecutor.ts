/**
 * MoveExecutor - categorize-then-move for a single WorkItem.
 *
 * Every infra error is turned into an Outcome here; nothing escapes to the pool.
 * Resolving the destination name and moving into it happen under the target
 * directory's lock, so two workers never pick the same free name. The move itself
 * never replaces a file, so a name taken by another process after it was resolved
 * ends as Failed{AlreadyExists}.
 */

import { Effect, Match, Option, pipe } from "effect";
import { join } from "node:path";
import {
  FileOpsServiceTag,
  type FileOpError,
  type FileOpsService
} from "@services/FileOpsService";
import type { CategoryMapping } from "@domain/CategoryMapping";
import { resolveCategory } from "@domain/CategoryResolver";
import { resolveConflict } from "@domain/ConflictResolver";
import { OrganizeEvent, type OrganizeEventHandler } from "@domain/OrganizeEvent";
import { Outcome } from "@domain/Outcome";
import { fileNameOf, type WorkItem } from "@domain/WorkItem";
import type { KeyedLock } from "@lib/KeyedLock";

export interface MoveExecutor {
  readonly execute: (item: WorkItem) => Effect.Effect<Outcome>;
}

export interface MoveExecutorOptions {
  readonly mapping: CategoryMapping;
  readonly locks: KeyedLock;
  readonly onEvent?: OrganizeEventHandler;
}

export const describeFileOpError = Match.typeTags<FileOpError>()({
  FileOpNotFound: (e) => `${e.path} does not exist`,
  FileOpAlreadyExists: (e) => `${e.path} already exists`,
  FileOpPermissionDenied: (e) => `permission denied for ${e.path}`,
  FileOpCrossDevice: (e) => `${e.path} is on another filesystem`,
  FileOpNotADirectory: (e) => `${e.path} is not a directory`,
  FileOpFailed: (e) => e.reason
});

export const toFailedOutcome = (sourcePath: string, error: FileOpError): Outcome =>
  Outcome.Failed({
    sourcePath,
    errorKind: Match.value(error).pipe(
      Match.tag("FileOpNotFound", () => "NotFound" as const),
      Match.tag("FileOpAlreadyExists", () => "AlreadyExists" as const),
      Match.tag("FileOpPermissionDenied", () => "PermissionDenied" as const),
      Match.orElse(() => "IOError" as const)
    ),
    detail: describeFileOpError(error)
  });

/**
 * Copy, then delete the original. Once the copy exists the data is safe, so a failed
 * delete is reported as a cleanup problem rather than a failed move.
 */
const copyThenDelete = (
  ops: FileOpsService,
  from: string,
  to: string
): Effect.Effect<Option.Option<string>, FileOpError> =>
  Effect.gen(function* () {
    yield* pipe(
      ops.copyFile(from, to),
      // A taken destination belongs to someone else and stays untouched.
      Effect.tapError((error) =>
        error._tag === "FileOpAlreadyExists"
          ? Effect.void
          : pipe(
              ops.remove(to),
              Effect.catchAll((e) =>
                Effect.logDebug(`Could not remove partial copy: ${describeFileOpError(e)}`)
              )
            )
      )
    );

    return yield* pipe(
      ops.remove(from),
      Effect.as(Option.none<string>()),
      Effect.catchAll((e) =>
        pipe(
          Effect.logWarning(`Copied ${from} to ${to} but could not delete the original`),
          Effect.as(Option.some(describeFileOpError(e)))
        )
      )
    );
  });

const relocate = (
  ops: FileOpsService,
  from: string,
  to: string
): Effect.Effect<Option.Option<string>, FileOpError> =>
  pipe(
    ops.rename(from, to),
    Effect.as(Option.none<string>()),
    Effect.catchTag("FileOpCrossDevice", () =>
      pipe(
        Effect.logDebug(`Atomic rename not possible for ${from}, copying instead`),
        Effect.zipRight(copyThenDelete(ops, from, to))
      )
    )
  );

export const makeMoveExecutor = (
  options: MoveExecutorOptions
): Effect.Effect<MoveExecutor, never, FileOpsServiceTag> =>
  Effect.gen(function* () {
    const ops = yield* FileOpsServiceTag;
    const emit: OrganizeEventHandler = options.onEvent ?? (() => Effect.void);

    const execute = (item: WorkItem): Effect.Effect<Outcome> => {
      const fileName = fileNameOf(item);
      const category = resolveCategory(options.mapping, fileName);
      const targetDirectory = join(item.baseDirectory, category);

      const claimAndMove = Effect.gen(function* () {
        const destination = yield* resolveConflict(join(targetDirectory, fileName), ops.exists);
        yield* Effect.logDebug(`Moving ${item.sourcePath} → ${destination}`);
        const cleanupFailure = yield* relocate(ops, item.sourcePath, destination);
        return Outcome.Moved({ from: item.sourcePath, to: destination, category, cleanupFailure });
      });

      return pipe(
        ops.ensureDirectory(targetDirectory),
        Effect.tap((created) =>
          created
            ? emit(OrganizeEvent.DirectoryCreated({ path: targetDirectory, category }))
            : Effect.void
        ),
        Effect.zipRight(options.locks.withLock(targetDirectory)(claimAndMove)),
        Effect.catchAll((error) => Effect.succeed(toFailedOutcome(item.sourcePath, error))),
        Effect.tap((outcome) => emit(OrganizeEvent.ItemCompleted({ outcome }))),
        // An item that has started always reaches its Outcome.
        Effect.uninterruptible
      );
    };

    return { execute };
  });
