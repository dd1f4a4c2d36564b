/**
 * LoggerService - formatted console output for the organize command
 */

import { Context, Effect, Layer, Console } from "effect"
import type { FailureKind, OutcomeCounts } from "@domain/Outcome"

// =============================================================================
// Service interface
// =============================================================================

export interface SummaryStats {
  readonly submitted: number
  readonly moved: number
  readonly skipped: number
  readonly failed: number
}

export interface LoggerService {
  readonly organize: {
    readonly header: Effect.Effect<void>
    readonly configCreated: (path: string) => Effect.Effect<void>
    readonly configLoaded: (path: string, mappings: number, usedDefaults: boolean) => Effect.Effect<void>
    readonly scanning: (directory: string, workers: number) => Effect.Effect<void>
    readonly directoryCreated: (category: string) => Effect.Effect<void>
    readonly moved: (fileName: string, category: string, finalName: string) => Effect.Effect<void>
    readonly skipped: (fileName: string, reason: string) => Effect.Effect<void>
    readonly failed: (fileName: string, kind: FailureKind, detail: string) => Effect.Effect<void>
    readonly cleanupWarning: (fileName: string, detail: string) => Effect.Effect<void>
    readonly timedOut: (seconds: number, notStarted: number) => Effect.Effect<void>
    readonly interrupted: (completed: OutcomeCounts) => Effect.Effect<void>
    readonly summary: (stats: SummaryStats) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const printCounts = (stats: SummaryStats) =>
  Effect.gen(function* () {
    yield* Console.log(`   Total files: ${stats.submitted}`)
    yield* Console.log(`   Moved: ${stats.moved}`)
    if (stats.skipped > 0) yield* Console.log(`   Skipped: ${stats.skipped}`)
    yield* Console.log(`   Failed: ${stats.failed}`)
  })

export const LoggerServiceLive = Layer.succeed(
  LoggerServiceTag,
  {
    organize: {
      header: Console.log("\n🗂️  Dir Organizer\n"),
      configCreated: (path) =>
        Console.log(`📝 Config file not found. Created default configuration at ${path}`),
      configLoaded: (path, mappings, usedDefaults) =>
        Console.log(
          usedDefaults
            ? `⚙️  ${path} has no mappings, using ${mappings} built-in defaults`
            : `⚙️  Loaded ${mappings} category mappings from ${path}`
        ),
      scanning: (directory, workers) =>
        Console.log(`🔍 Organizing ${directory} with ${workers} workers...\n`),
      directoryCreated: (category) => Console.log(`📁 Created directory: ${category}`),
      moved: (fileName, category, finalName) =>
        Console.log(`   Moved: ${fileName} → ${category}/${finalName}`),
      skipped: (fileName, reason) => Console.log(`   Skipped: ${fileName} (${reason})`),
      failed: (fileName, kind, detail) =>
        Console.error(`❌ Failed: ${fileName} [${kind}] ${detail}`),
      cleanupWarning: (fileName, detail) =>
        Console.error(`⚠️  ${fileName} was copied but the original could not be removed: ${detail}`),
      timedOut: (seconds, notStarted) =>
        Console.error(
          `\n⚠️  Timed out after ${seconds}s waiting for workers; ${notStarted} file(s) were not started`
        ),
      interrupted: (completed) =>
        Effect.gen(function* () {
          yield* Console.error("\n⚠️  Interrupted. Finished before stopping:")
          yield* Console.error(`   Moved: ${completed.moved}`)
          yield* Console.error(`   Failed: ${completed.failed}`)
        }),
      summary: (stats) =>
        Effect.gen(function* () {
          yield* Console.log(`\n📊 Summary:`)
          yield* printCounts(stats)
          if (stats.submitted === 0) {
            yield* Console.log("\n✓ Nothing to organize\n")
          } else if (stats.moved === stats.submitted) {
            yield* Console.log(`\n✓ Processed ${stats.moved} file(s)\n`)
          } else {
            yield* Console.error(
              `\n⚠️  Processed ${stats.moved} of ${stats.submitted} file(s); ${stats.failed + stats.skipped} not moved\n`
            )
          }
        })
    }
  }
)
