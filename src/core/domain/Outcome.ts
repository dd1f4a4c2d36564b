import { Data, Option } from "effect";

export type FailureKind = "NotFound" | "AlreadyExists" | "PermissionDenied" | "IOError";

/** Terminal result of one WorkItem; exactly one is produced per submitted item. */
export type Outcome = Data.TaggedEnum<{
  Moved: {
    readonly from: string;
    readonly to: string;
    readonly category: string;
    /** Set when the data was copied across filesystems but the original could not be deleted. */
    readonly cleanupFailure: Option.Option<string>;
  };
  Skipped: {
    readonly sourcePath: string;
    readonly reason: string;
  };
  Failed: {
    readonly sourcePath: string;
    readonly errorKind: FailureKind;
    readonly detail: string;
  };
}>;

export const Outcome = Data.taggedEnum<Outcome>();

export interface OutcomeCounts {
  readonly moved: number;
  readonly skipped: number;
  readonly failed: number;
}

export const countOutcomes = (outcomes: ReadonlyArray<Outcome>): OutcomeCounts =>
  outcomes.reduce<OutcomeCounts>(
    (acc, outcome) =>
      Outcome.$match(outcome, {
        Moved: () => ({ ...acc, moved: acc.moved + 1 }),
        Skipped: () => ({ ...acc, skipped: acc.skipped + 1 }),
        Failed: () => ({ ...acc, failed: acc.failed + 1 })
      }),
    { moved: 0, skipped: 0, failed: 0 }
  );

export const sourceOf = (outcome: Outcome): string =>
  Outcome.$match(outcome, {
    Moved: (o) => o.from,
    Skipped: (o) => o.sourcePath,
    Failed: (o) => o.sourcePath
  });
