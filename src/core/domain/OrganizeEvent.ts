import { Data, type Effect } from "effect";
import type { Outcome } from "./Outcome";

/** Progress notifications a scan reports to whoever is watching it. */
export type OrganizeEvent = Data.TaggedEnum<{
  DirectoryCreated: {
    readonly path: string;
    readonly category: string;
  };
  ItemCompleted: {
    readonly outcome: Outcome;
  };
}>;

export const OrganizeEvent = Data.taggedEnum<OrganizeEvent>();

export type OrganizeEventHandler = (event: OrganizeEvent) => Effect.Effect<void>;
