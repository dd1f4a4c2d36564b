import { Cause, Data, Exit, Match, Option, Predicate } from "effect";

import type { ConfigLoadError } from "@services/ConfigService";
import type { InvalidSourceDirectory, ScanFailed, ScanInterrupted } from "@services/OrganizerService";

/** A run that finished, but left some files where they were. */
export class OrganizeIncomplete extends Data.TaggedError("OrganizeIncomplete")<{
  readonly failed: number;
  readonly skipped: number;
}> {}

type DomainError =
  | ConfigLoadError
  | InvalidSourceDirectory
  | ScanFailed
  | ScanInterrupted
  | OrganizeIncomplete;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  configLoadFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot load config",
      `Could not read category mappings from "${path}": ${reason}`,
      `Fix the file, or delete it to have a default configuration written on the next run.`
    ),

  sourceNotFound: (path: string) =>
    new AppError(
      "Source directory not found",
      `The path "${path}" does not exist.`,
      `Check the path, or pass the directory to organize as the first argument.`
    ),

  sourceNotADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `The path "${path}" exists but is not a directory.`,
      `Only directories can be organized. Check that you provided the correct path.`
    ),

  sourcePermissionDenied: (path: string) =>
    new AppError(
      "Permission denied",
      `Cannot access "${path}": permission denied.`,
      `Check that your user can read and write this directory.`
    ),

  sourceUnreadable: (path: string, detail: string) =>
    new AppError(
      "Cannot read source directory",
      `Could not inspect "${path}": ${detail}`,
      `Check that the directory is accessible and the disk is healthy.`
    ),

  scanFailed: (path: string, reason: string) =>
    new AppError(
      "Scan failed",
      `Could not list files in "${path}": ${reason}`,
      `Check that the directory still exists and you have read permission.`
    ),

  interrupted: (path: string, completed: number, submitted: number) =>
    new AppError(
      "Interrupted",
      `Stopped organizing "${path}" after ${completed} of ${submitted} file(s).`,
      `Run again to organize the remaining files.`
    ),

  incomplete: (failed: number, skipped: number) =>
    new AppError(
      "Some files were not moved",
      `${failed} file(s) failed and ${skipped} file(s) were skipped.`,
      `See the messages above, fix the cause and run again. Files already moved stay where they are.`
    ),

  invalidOption: (name: string, detail: string) =>
    new AppError("Invalid option", `--${name} ${detail}`, `Run with --help to see the accepted values.`),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  ConfigLoadError: (e) => errors.configLoadFailed(e.path, e.reason),

  InvalidSourceDirectory: (e) => {
    switch (e.reason) {
      case "NotFound":
        return errors.sourceNotFound(e.path);
      case "NotADirectory":
        return errors.sourceNotADirectory(e.path);
      case "PermissionDenied":
        return errors.sourcePermissionDenied(e.path);
      case "Unreadable":
        return errors.sourceUnreadable(e.path, e.detail);
    }
  },

  ScanFailed: (e) => errors.scanFailed(e.path, e.reason),
  ScanInterrupted: (e) => errors.interrupted(e.path, e.moved + e.failed, e.submitted),
  OrganizeIncomplete: (e) => errors.incomplete(e.failed, e.skipped)
});

const domainTags: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "ConfigLoadError",
  "InvalidSourceDirectory",
  "ScanFailed",
  "ScanInterrupted",
  "OrganizeIncomplete"
]);

const isDomainError = (e: unknown): e is DomainError =>
  Predicate.hasProperty(e, "_tag") && typeof e._tag === "string" && domainTags.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

/** 0 on success, 130 when the run was interrupted, 1 for any other failure. */
export const exitCodeOf = <A, E>(exit: Exit.Exit<A, E>): number => {
  if (Exit.isSuccess(exit)) {
    return 0;
  }
  if (Cause.isInterruptedOnly(exit.cause)) {
    return 130;
  }
  return Option.match(Cause.failureOption(exit.cause), {
    onNone: () => 1,
    onSome: (error) => (Predicate.isTagged(error, "ScanInterrupted") ? 130 : 1)
  });
};

export const {
  configLoadFailed,
  sourceNotFound,
  sourceNotADirectory,
  sourcePermissionDenied,
  sourceUnreadable,
  scanFailed,
  interrupted,
  incomplete,
  invalidOption,
  unexpected,
  permissionDenied
} = errors;
