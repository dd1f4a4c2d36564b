import { Cause, Deferred, Duration, Effect, Exit, Fiber, Option, pipe } from "effect"
import { Console } from "effect"
import { basename } from "node:path"

import { OrganizeIncomplete, fromDomainError, invalidOption } from "./errors"

// Import from core library
import { OrganizeEvent, Outcome, sourceOf } from "@core"
import { ConfigServiceTag } from "@services/ConfigService"
import { LoggerServiceTag, type LoggerService } from "@services/LoggerService"
import { OrganizerServiceTag, type OrganizerError } from "@services/OrganizerService"

export interface OrganizeCommandOptions {
  readonly source: string
  readonly config: string
  readonly workers: number
  readonly timeout: number
  readonly debug: boolean
}

/**
 * Error handling wrapper for CLI commands. The error is printed and kept,
 * so the process still exits non-zero.
 */
export const withErrorHandling = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<void, E, R> =>
  pipe(
    effect,
    Effect.tapError((error) => {
      const appError = fromDomainError(error)
      return Console.error(`\n${appError.format()}`)
    }),
    Effect.asVoid
  )

/**
 * Prints one progress line per event reported by the organizer
 */
export const reportEvent =
  (logger: LoggerService) =>
  (event: OrganizeEvent): Effect.Effect<void> =>
    OrganizeEvent.$match(event, {
      DirectoryCreated: ({ category }) => logger.organize.directoryCreated(category),
      ItemCompleted: ({ outcome }) => {
        const fileName = basename(sourceOf(outcome))
        return Outcome.$match(outcome, {
          Moved: (moved) =>
            Effect.zipRight(
              logger.organize.moved(fileName, moved.category, basename(moved.to)),
              Option.match(moved.cleanupFailure, {
                onNone: () => Effect.void,
                onSome: (detail) => logger.organize.cleanupWarning(fileName, detail)
              })
            ),
          Skipped: (skipped) => logger.organize.skipped(fileName, skipped.reason),
          Failed: (failed) => logger.organize.failed(fileName, failed.errorKind, failed.detail)
        })
      }
    })

/**
 * Prints how a session that was asked to stop ended
 */
const reportStopped = (logger: LoggerService, error: OrganizerError): Effect.Effect<void> =>
  Effect.zipRight(
    error._tag === "ScanInterrupted"
      ? logger.organize.interrupted({ moved: error.moved, skipped: error.skipped, failed: error.failed })
      : Effect.void,
    Console.error(`\n${fromDomainError(error).format()}`)
  )

/**
 * Run the organize command
 */
export const runOrganize = (options: OrganizeCommandOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const configService = yield* ConfigServiceTag
    const organizer = yield* OrganizerServiceTag

    if (options.workers < 1) {
      return yield* Effect.fail(invalidOption("workers", `must be at least 1, got ${options.workers}`))
    }
    if (options.timeout <= 0) {
      return yield* Effect.fail(invalidOption("timeout", `must be a positive number of seconds, got ${options.timeout}`))
    }

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    yield* logger.organize.header

    const loaded = yield* configService.load(options.config)
    if (loaded.created) {
      yield* logger.organize.configCreated(loaded.path)
    } else {
      yield* logger.organize.configLoaded(loaded.path, loaded.mapping.size, loaded.usedDefaults)
    }

    yield* logger.organize.scanning(options.source, options.workers)

    // Ctrl+C interrupts this fiber. The session then gets a stop request, lets the
    // moves in flight finish and reports what it completed before the process exits.
    const stopRequested = yield* Deferred.make<void>()
    const session = yield* Effect.fork(
      organizer.organize(options.source, loaded.mapping, {
        concurrency: options.workers,
        timeout: Duration.seconds(options.timeout),
        onEvent: reportEvent(logger),
        interrupt: Deferred.await(stopRequested)
      })
    )

    const stopSession = pipe(
      Deferred.succeed(stopRequested, undefined),
      Effect.zipRight(Fiber.await(session)),
      Effect.flatMap((exit) =>
        Exit.isFailure(exit)
          ? Option.match(Cause.failureOption(exit.cause), {
              onNone: () => Effect.void,
              onSome: (error) => reportStopped(logger, error)
            })
          : Effect.void
      )
    )

    const report = yield* pipe(Fiber.join(session), Effect.onInterrupt(() => stopSession))

    if (report.timedOut) {
      yield* logger.organize.timedOut(options.timeout, report.skipped)
    }

    yield* logger.organize.summary(report)

    if (report.failed > 0 || report.skipped > 0) {
      return yield* Effect.fail(new OrganizeIncomplete({ failed: report.failed, skipped: report.skipped }))
    }

    return report
  })
