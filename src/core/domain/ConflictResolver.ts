import { Effect } from "effect";
import { basename, dirname, join } from "node:path";
import { splitFileName } from "./FileName";

export const numberedFileName = (fileName: string, counter: number): string => {
  const { stem, extension } = splitFileName(fileName);
  return `${stem}_${counter}${extension}`;
};

/**
 * First free path among `desiredPath`, `stem_1.ext`, `stem_2.ext`, ...
 *
 * The answer is only free as of the last `exists` check. Callers that move into the
 * returned path must hold the destination directory's lock across resolve + move.
 */
export const resolveConflict = <E, R>(
  desiredPath: string,
  exists: (path: string) => Effect.Effect<boolean, E, R>
): Effect.Effect<string, E, R> =>
  Effect.gen(function* () {
    if (!(yield* exists(desiredPath))) {
      return desiredPath;
    }

    const directory = dirname(desiredPath);
    const fileName = basename(desiredPath);

    for (let counter = 1; ; counter++) {
      const candidate = join(directory, numberedFileName(fileName, counter));
      if (!(yield* exists(candidate))) {
        return candidate;
      }
    }
  });
