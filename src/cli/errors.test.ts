/**
 * Tests for error handling - verify domain errors are converted to user-friendly messages.
 */

import { describe, expect, test } from "vitest"
import { Exit, FiberId } from "effect"
import { ConfigLoadError } from "@services/ConfigService"
import { InvalidSourceDirectory, ScanFailed, ScanInterrupted } from "@services/OrganizerService"
import {
  AppError,
  OrganizeIncomplete,
  exitCodeOf,
  fromDomainError,
  incomplete,
  invalidOption,
  sourceNotFound,
} from "./errors"

describe("AppError", () => {
  test("format() produces readable output with title, detail, and suggestion", () => {
    const error = new AppError("Test Error", "Something went wrong.", "Try doing X instead.")

    expect(error.format()).toBe(
      ["ERROR: Test Error", "", "   Something went wrong.", "", "   Hint: Try doing X instead."].join("\n")
    )
  })
})

describe("Domain error constructors", () => {
  test("sourceNotFound names the path", () => {
    const error = sourceNotFound("/home/me/Downloads")

    expect(error.title).toBe("Source directory not found")
    expect(error.detail).toBe('The path "/home/me/Downloads" does not exist.')
  })

  test("incomplete reports both counts", () => {
    const error = incomplete(2, 1)

    expect(error.detail).toBe("2 file(s) failed and 1 file(s) were skipped.")
  })

  test("invalidOption names the flag", () => {
    const error = invalidOption("workers", "must be at least 1, got 0")

    expect(error.detail).toBe("--workers must be at least 1, got 0")
  })
})

describe("fromDomainError", () => {
  test("passes through AppError unchanged", () => {
    const original = new AppError("Original", "Detail", "Suggestion")

    expect(fromDomainError(original)).toBe(original)
  })

  test("converts standard Error to unexpected error", () => {
    const appError = fromDomainError(new Error("Something broke"))

    expect(appError.title).toBe("Unexpected error")
    expect(appError.detail).toBe("Something broke")
  })

  test("converts permission Error to permission denied", () => {
    const appError = fromDomainError(new Error("EACCES: permission denied"))

    expect(appError.title).toBe("Permission denied")
  })

  test("converts unknown value to unexpected error", () => {
    const appError = fromDomainError("just a string")

    expect(appError.title).toBe("Unexpected error")
    expect(appError.detail).toBe("just a string")
  })

  test("an unknown tag is treated as an unexpected error", () => {
    const appError = fromDomainError({ _tag: "SomethingElse" })

    expect(appError.title).toBe("Unexpected error")
  })
})

// =============================================================================
// Tests for typed service errors
// =============================================================================

describe("fromDomainError with typed errors", () => {
  test("converts ConfigLoadError", () => {
    const appError = fromDomainError(new ConfigLoadError({ path: "config.json", reason: "Invalid JSON: oops" }))

    expect(appError.title).toBe("Cannot load config")
    expect(appError.detail).toBe('Could not read category mappings from "config.json": Invalid JSON: oops')
  })

  test("converts each InvalidSourceDirectory reason", () => {
    const titleFor = (reason: InvalidSourceDirectory["reason"]) =>
      fromDomainError(new InvalidSourceDirectory({ path: "/dl", reason, detail: "because" })).title

    expect(titleFor("NotFound")).toBe("Source directory not found")
    expect(titleFor("NotADirectory")).toBe("Not a directory")
    expect(titleFor("PermissionDenied")).toBe("Permission denied")
    expect(titleFor("Unreadable")).toBe("Cannot read source directory")
  })

  test("converts ScanFailed", () => {
    const appError = fromDomainError(new ScanFailed({ path: "/dl", reason: "permission denied for /dl" }))

    expect(appError.title).toBe("Scan failed")
    expect(appError.detail).toBe('Could not list files in "/dl": permission denied for /dl')
  })

  test("converts ScanInterrupted with the completed count", () => {
    const appError = fromDomainError(
      new ScanInterrupted({ path: "/dl", submitted: 10, moved: 3, failed: 1, skipped: 6 })
    )

    expect(appError.title).toBe("Interrupted")
    expect(appError.detail).toBe('Stopped organizing "/dl" after 4 of 10 file(s).')
  })

  test("converts OrganizeIncomplete", () => {
    const appError = fromDomainError(new OrganizeIncomplete({ failed: 1, skipped: 0 }))

    expect(appError.title).toBe("Some files were not moved")
  })
})

describe("exitCodeOf", () => {
  test("success is 0", () => {
    expect(exitCodeOf(Exit.succeed(undefined))).toBe(0)
  })

  test("failures are 1", () => {
    expect(exitCodeOf(Exit.fail(new OrganizeIncomplete({ failed: 1, skipped: 0 })))).toBe(1)
    expect(exitCodeOf(Exit.fail(new ConfigLoadError({ path: "c.json", reason: "bad" })))).toBe(1)
    expect(exitCodeOf(Exit.die(new Error("boom")))).toBe(1)
  })

  test("interruption is 130", () => {
    expect(exitCodeOf(Exit.interrupt(FiberId.none))).toBe(130)
    expect(
      exitCodeOf(Exit.fail(new ScanInterrupted({ path: "/dl", submitted: 1, moved: 0, failed: 0, skipped: 1 })))
    ).toBe(130)
  })
})
