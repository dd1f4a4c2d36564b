import { describe, expect, test } from "vitest"
import { Deferred, Effect, Either, Exit, Fiber, Layer, pipe } from "effect"

import { createTestContext, type TestContext } from "@test/TestContext"
import { makeCategoryMapping } from "@domain/CategoryMapping"
import { ConfigServiceTag } from "@services/ConfigService"
import { LoggerServiceTag, type LoggerService } from "@services/LoggerService"
import { OrganizerServiceLive, OrganizerServiceTag, ScanFailed, ScanInterrupted } from "@services/OrganizerService"
import { exitCodeOf } from "./errors"
import { runOrganize, withErrorHandling, type OrganizeCommandOptions } from "./handler"

const mapping = makeCategoryMapping({ pdf: "Documents", jpg: "Images" })

const recordingLogger = () => {
  const lines: Array<string> = []
  const log = (line: string) =>
    Effect.sync(() => {
      lines.push(line)
    })

  const logger: LoggerService = {
    organize: {
      header: log("header"),
      configCreated: (path) => log(`configCreated ${path}`),
      configLoaded: (path, mappings, usedDefaults) => log(`configLoaded ${path} ${mappings} ${usedDefaults}`),
      scanning: (directory, workers) => log(`scanning ${directory} ${workers}`),
      directoryCreated: (category) => log(`directoryCreated ${category}`),
      moved: (fileName, category, finalName) => log(`moved ${fileName} → ${category}/${finalName}`),
      skipped: (fileName) => log(`skipped ${fileName}`),
      failed: (fileName, kind) => log(`failed ${fileName} ${kind}`),
      cleanupWarning: (fileName, detail) => log(`cleanup ${fileName} ${detail}`),
      timedOut: (seconds, notStarted) => log(`timedOut ${seconds} ${notStarted}`),
      interrupted: (completed) => log(`interrupted ${completed.moved}`),
      summary: (stats) => log(`summary ${stats.submitted} ${stats.moved} ${stats.skipped} ${stats.failed}`)
    }
  }

  return { lines, layer: Layer.succeed(LoggerServiceTag, logger) }
}

const configStub = (created: boolean) =>
  Layer.succeed(ConfigServiceTag, {
    load: (path: string) => Effect.succeed({ path, mapping, created, usedDefaults: created })
  })

const defaults: OrganizeCommandOptions = {
  source: "/dl",
  config: "config.json",
  workers: 2,
  timeout: 60,
  debug: false
}

const run = (ctx: TestContext, options: Partial<OrganizeCommandOptions> = {}, created = false) => {
  const logger = recordingLogger()
  const layer = Layer.mergeAll(
    logger.layer,
    configStub(created),
    pipe(OrganizerServiceLive, Layer.provide(ctx.layer))
  )

  return pipe(
    runOrganize({ ...defaults, ...options }),
    Effect.either,
    Effect.provide(layer),
    Effect.runPromise,
    (promise) => promise.then((result) => ({ result, lines: logger.lines }))
  )
}

describe("runOrganize", () => {
  test("reports config, progress and a summary", async () => {
    const ctx = createTestContext()
    ctx.addFile("/dl/report.pdf")
    ctx.addFile("/dl/photo.jpg")

    const { result, lines } = await run(ctx)

    expect(Either.isRight(result)).toBe(true)
    expect(lines.slice(0, 3)).toEqual(["header", "configLoaded config.json 2 false", "scanning /dl 2"])
    expect(lines).toContain("directoryCreated Documents")
    expect(lines).toContain("directoryCreated Images")
    expect(lines).toContain("moved report.pdf → Documents/report.pdf")
    expect(lines).toContain("moved photo.jpg → Images/photo.jpg")
    expect(lines[lines.length - 1]).toBe("summary 2 2 0 0")
  })

  test("announces a freshly created config file", async () => {
    const ctx = createTestContext()
    ctx.addDirectory("/dl")

    const { lines } = await run(ctx, {}, true)

    expect(lines).toEqual(["header", "configCreated config.json", "scanning /dl 2", "summary 0 0 0 0"])
  })

  test("a failed file makes the run fail with OrganizeIncomplete after the summary", async () => {
    const ctx = createTestContext()
    ctx.addFile("/dl/report.pdf")
    ctx.addFile("/dl/locked.pdf")
    ctx.denyPermission("/dl/locked.pdf")

    const { result, lines } = await run(ctx)

    expect(Either.isLeft(result) && result.left).toMatchObject({
      _tag: "OrganizeIncomplete",
      failed: 1,
      skipped: 0
    })
    expect(lines).toContain("failed locked.pdf PermissionDenied")
    expect(lines[lines.length - 1]).toBe("summary 2 1 0 1")
  })

  test("a missing source fails before any progress is printed", async () => {
    const ctx = createTestContext()

    const { result, lines } = await run(ctx, { source: "/nowhere" })

    expect(Either.isLeft(result) && result.left._tag).toBe("InvalidSourceDirectory")
    expect(lines).toEqual(["header", "configLoaded config.json 2 false", "scanning /nowhere 2"])
  })

  test("rejects a worker count below 1 before doing anything", async () => {
    const ctx = createTestContext()

    const { result, lines } = await run(ctx, { workers: 0 })

    expect(Either.isLeft(result) && result.left._tag).toBe("AppError")
    expect(lines).toEqual([])
    expect(ctx.calls).toEqual([])
  })

  test("rejects a non-positive timeout", async () => {
    const ctx = createTestContext()

    const { result } = await run(ctx, { timeout: 0 })

    expect(Either.isLeft(result) && result.left._tag).toBe("AppError")
  })
})

describe("runOrganize interruption", () => {
  // Runs until asked to stop, then reports one of three files moved
  const stoppableOrganizer = (started: Deferred.Deferred<void>) =>
    Layer.succeed(OrganizerServiceTag, {
      organize: (path, _mapping, options = {}) =>
        pipe(
          Deferred.succeed(started, undefined),
          Effect.zipRight(options.interrupt ?? Effect.never),
          Effect.zipRight(
            Effect.fail(new ScanInterrupted({ path, submitted: 3, moved: 1, failed: 0, skipped: 2 }))
          )
        )
    })

  test("interrupting the command asks the session to stop and reports what it completed", async () => {
    const logger = recordingLogger()

    const exit = await Effect.runPromise(
      Effect.gen(function* () {
        const started = yield* Deferred.make<void>()
        const fiber = yield* pipe(
          runOrganize(defaults),
          Effect.provide(Layer.mergeAll(logger.layer, configStub(false), stoppableOrganizer(started))),
          Effect.fork
        )
        yield* Deferred.await(started)
        return yield* Fiber.interrupt(fiber)
      })
    )

    expect(Exit.isInterrupted(exit)).toBe(true)
    expect(exitCodeOf(exit)).toBe(130)
    expect(logger.lines).toEqual(["header", "configLoaded config.json 2 false", "scanning /dl 2", "interrupted 1"])
  })
})

describe("withErrorHandling", () => {
  test("keeps the original error after printing it", async () => {
    const error = new ScanFailed({ path: "/dl", reason: "gone" })

    const result = await pipe(withErrorHandling(Effect.fail(error)), Effect.either, Effect.runPromise)

    expect(Either.isLeft(result) && result.left).toBe(error)
  })
})
