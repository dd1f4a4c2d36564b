import { Args, Options } from "@effect/cli";

export const source = Args.text({ name: "source" }).pipe(
  Args.withDescription("Directory whose files are sorted into category folders"),
  Args.withDefault("Downloads")
);

export const config = Args.text({ name: "config" }).pipe(
  Args.withDescription("Extension → category mapping file. Created with defaults if missing."),
  Args.withDefault("config.json")
);

export const workers = Options.integer("workers").pipe(
  Options.withAlias("w"),
  Options.withDescription("Files moved in parallel (default: 4)"),
  Options.withDefault(4)
);

export const timeout = Options.integer("timeout").pipe(
  Options.withDescription("Seconds to wait for the workers once all files are queued (default: 60)"),
  Options.withDefault(60)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);
