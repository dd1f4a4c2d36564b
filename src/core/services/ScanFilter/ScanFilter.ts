import { Effect, pipe } from "effect";
import { join } from "node:path";
import { FileOpsServiceTag } from "@services/FileOpsService";
import { describeFileOpError } from "@services/MoveExecutor";
import { admit, isHiddenName } from "@domain/ScanFilter";

/**
 * Decide whether a directory entry is organized. Hidden names are rejected without
 * touching the disk; anything whose type cannot be read is rejected too.
 */
export const admitEntry = (
  directory: string,
  name: string
): Effect.Effect<boolean, never, FileOpsServiceTag> => {
  if (isHiddenName(name)) {
    return Effect.succeed(false);
  }

  return Effect.flatMap(FileOpsServiceTag, (ops) =>
    pipe(
      ops.stat(join(directory, name)),
      Effect.map(({ kind }) => admit({ name, kind })),
      Effect.catchAll((e) =>
        pipe(
          Effect.logDebug(`Skipping ${name}: ${describeFileOpError(e)}`),
          Effect.as(false)
        )
      )
    )
  );
};
