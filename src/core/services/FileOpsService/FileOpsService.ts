/**
 * FileOpsService - the filesystem operations the organizer needs, with typed errors.
 *
 * Live implementation uses @effect/platform FileSystem. Tests swap in the
 * in-memory filesystem from src/test/TestContext.
 */

import { Context, Data, Effect, Layer, Predicate, Stream, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { EntryKind } from "@domain/ScanFilter";

export class FileOpNotFound extends Data.TaggedError("FileOpNotFound")<{
  readonly path: string;
}> {}

export class FileOpAlreadyExists extends Data.TaggedError("FileOpAlreadyExists")<{
  readonly path: string;
}> {}

export class FileOpPermissionDenied extends Data.TaggedError("FileOpPermissionDenied")<{
  readonly path: string;
}> {}

export class FileOpCrossDevice extends Data.TaggedError("FileOpCrossDevice")<{
  readonly path: string;
}> {}

export class FileOpNotADirectory extends Data.TaggedError("FileOpNotADirectory")<{
  readonly path: string;
}> {}

export class FileOpFailed extends Data.TaggedError("FileOpFailed")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type FileOpError =
  | FileOpNotFound
  | FileOpAlreadyExists
  | FileOpPermissionDenied
  | FileOpCrossDevice
  | FileOpNotADirectory
  | FileOpFailed;

export interface FileStat {
  readonly kind: EntryKind;
}

export interface FileOpsService {
  readonly exists: (path: string) => Effect.Effect<boolean, FileOpError>;
  /** Follows symlinks. */
  readonly stat: (path: string) => Effect.Effect<FileStat, FileOpError>;
  /** Names of the direct children of a directory. */
  readonly list: (directory: string) => Effect.Effect<ReadonlyArray<string>, FileOpError>;
  /** Creates the directory and missing ancestors. Succeeds with `true` only if it was absent. */
  readonly ensureDirectory: (directory: string) => Effect.Effect<boolean, FileOpError>;
  /**
   * Moves a file within one filesystem. Never replaces anything at `to`: a taken
   * destination fails with FileOpAlreadyExists. FileOpCrossDevice means the move
   * cannot be done in place and the file has to be copied.
   */
  readonly rename: (from: string, to: string) => Effect.Effect<void, FileOpError>;
  /** Creates `to` exclusively; a taken destination fails with FileOpAlreadyExists. */
  readonly copyFile: (from: string, to: string) => Effect.Effect<void, FileOpError>;
  readonly remove: (path: string) => Effect.Effect<void, FileOpError>;
}

export class FileOpsServiceTag extends Context.Tag("FileOpsService")<
  FileOpsServiceTag,
  FileOpsService
>() {}

// =============================================================================
// Error detection from node / @effect/platform errors
// =============================================================================

const readField = (value: unknown, key: string): unknown =>
  Predicate.hasProperty(value, key) ? value[key] : undefined;

const readString = (value: unknown, key: string): string | undefined => {
  const field = readField(value, key);
  return typeof field === "string" ? field : undefined;
};

const KNOWN_CODES = [
  "ENOENT",
  "EEXIST",
  "ENOTEMPTY",
  "EACCES",
  "EPERM",
  "EXDEV",
  "ENOTDIR",
  "ENOTSUP",
  "EOPNOTSUPP",
  "ENOSYS",
  "EMLINK"
];

/** link(2) failures that mean "no hard link here", as opposed to a problem with the paths. */
const LINK_UNAVAILABLE: ReadonlySet<string> = new Set(["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS", "EMLINK"]);

const describe = (error: unknown): string => readString(error, "message") ?? String(error);

const errnoOf = (error: unknown): string | undefined => {
  const code = readString(error, "code") ?? readString(readField(error, "cause"), "code");
  if (code) {
    return code.toUpperCase();
  }
  const message = describe(error).toUpperCase();
  return KNOWN_CODES.find((known) => new RegExp(`\\b${known}\\b`).test(message));
};

export const toFileOpError = (path: string, error: unknown): FileOpError => {
  switch (errnoOf(error)) {
    case "ENOENT":
      return new FileOpNotFound({ path });
    case "EEXIST":
    case "ENOTEMPTY":
      return new FileOpAlreadyExists({ path });
    case "EACCES":
    case "EPERM":
      return new FileOpPermissionDenied({ path });
    case "EXDEV":
      return new FileOpCrossDevice({ path });
    case "ENOTDIR":
      return new FileOpNotADirectory({ path });
  }

  switch (readString(error, "reason")) {
    case "NotFound":
      return new FileOpNotFound({ path });
    case "AlreadyExists":
      return new FileOpAlreadyExists({ path });
    case "PermissionDenied":
      return new FileOpPermissionDenied({ path });
  }

  const message = describe(error);
  const lower = message.toLowerCase();

  if (lower.includes("no such file")) {
    return new FileOpNotFound({ path });
  }
  if (lower.includes("permission denied") || lower.includes("operation not permitted")) {
    return new FileOpPermissionDenied({ path });
  }
  if (lower.includes("cross-device")) {
    return new FileOpCrossDevice({ path });
  }

  return new FileOpFailed({ path, reason: message });
};

/** Errors about the destination name are reported against `to`, everything else against `from`. */
const toTransferError = (from: string, to: string, error: unknown): FileOpError => {
  const mapped = toFileOpError(from, error);
  return mapped._tag === "FileOpAlreadyExists" ? new FileOpAlreadyExists({ path: to }) : mapped;
};

const toLinkError = (from: string, to: string, error: unknown): FileOpError => {
  const code = errnoOf(error);
  return code !== undefined && LINK_UNAVAILABLE.has(code)
    ? new FileOpCrossDevice({ path: from })
    : toTransferError(from, to, error);
};

const toEntryKind = (type: FileSystem.File.Type): EntryKind => {
  switch (type) {
    case "File":
    case "Directory":
    case "SymbolicLink":
      return type;
    default:
      return "Other";
  }
};

// =============================================================================
// Live implementation (uses @effect/platform FileSystem)
// =============================================================================

export const FileOpsServiceLive = Layer.effect(
  FileOpsServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const stat: FileOpsService["stat"] = (path) =>
      pipe(
        fs.stat(path),
        Effect.map((info): FileStat => ({ kind: toEntryKind(info.type) })),
        Effect.mapError((e) => toFileOpError(path, e))
      );

    const ensureDirectory: FileOpsService["ensureDirectory"] = (directory) =>
      pipe(
        stat(directory),
        Effect.flatMap(({ kind }) =>
          kind === "Directory"
            ? Effect.succeed(false)
            : Effect.fail(new FileOpNotADirectory({ path: directory }))
        ),
        Effect.catchTag("FileOpNotFound", () =>
          pipe(
            fs.makeDirectory(directory, { recursive: true }),
            Effect.as(true),
            Effect.mapError((e) => toFileOpError(directory, e))
          )
        )
      );

    return {
      exists: (path) =>
        pipe(
          fs.exists(path),
          Effect.mapError((e) => toFileOpError(path, e))
        ),

      stat,

      list: (directory) =>
        pipe(
          fs.readDirectory(directory),
          Effect.mapError((e) => toFileOpError(directory, e))
        ),

      ensureDirectory,

      // Hard link, then unlink: a file already at `to` is never replaced.
      rename: (from, to) =>
        pipe(
          fs.link(from, to),
          Effect.mapError((e) => toLinkError(from, to, e)),
          Effect.zipRight(
            pipe(
              fs.remove(from),
              Effect.mapError((e) => toFileOpError(from, e)),
              Effect.tapError(() =>
                pipe(
                  fs.remove(to),
                  Effect.catchAll((e) =>
                    Effect.logWarning(`${from} is now also at ${to} and could not be unlinked: ${describe(e)}`)
                  )
                )
              )
            )
          )
        ),

      copyFile: (from, to) =>
        pipe(
          fs.stat(from),
          Effect.flatMap((info) =>
            Stream.run(fs.stream(from), fs.sink(to, { flag: "wx", mode: info.mode & 0o777 }))
          ),
          Effect.mapError((e) => toTransferError(from, to, e))
        ),

      remove: (path) =>
        pipe(
          fs.remove(path),
          Effect.mapError((e) => toFileOpError(path, e))
        )
    };
  })
);
