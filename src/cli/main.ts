import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Logger, LogLevel } from "effect";

import * as Opts from "@cli/options";
import { runOrganize, withErrorHandling } from "@cli/handler";
import { exitCodeOf } from "@cli/errors";
import { AppLive } from "@core";

const organizeCommand = Command.make(
  "dir-organizer",
  {
    source: Opts.source,
    config: Opts.config,
    workers: Opts.workers,
    timeout: Opts.timeout,
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(runOrganize(opts)).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    )
).pipe(Command.withDescription("Sort the files of a directory into category folders by extension"));

const cli = Command.run(organizeCommand, {
  name: "dir-organizer",
  version: "0.1.0"
});

NodeRuntime.runMain(cli(process.argv).pipe(Effect.provide(NodeContext.layer)), {
  disableErrorReporting: true,
  teardown: (exit, onExit) => onExit(exitCodeOf(exit))
});
