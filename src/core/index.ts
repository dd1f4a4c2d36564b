import { Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

import { ConfigServiceLive } from "./services/ConfigService";
import { FileOpsServiceLive } from "./services/FileOpsService";
import { LoggerServiceLive } from "./services/LoggerService";
import { OrganizerServiceLive } from "./services/OrganizerService";

export type { CategoryMapping } from "./domain/CategoryMapping";
export {
  DEFAULT_CATEGORY,
  defaultCategoryMapping,
  makeCategoryMapping
} from "./domain/CategoryMapping";
export { resolveCategory } from "./domain/CategoryResolver";
export { resolveConflict, numberedFileName } from "./domain/ConflictResolver";
export { extensionOf, splitFileName } from "./domain/FileName";
export { OrganizeEvent, type OrganizeEventHandler } from "./domain/OrganizeEvent";
export { Outcome, countOutcomes, sourceOf, type FailureKind, type OutcomeCounts } from "./domain/Outcome";
export { makeWorkItem, type WorkItem } from "./domain/WorkItem";

export type { ConfigLoadError, LoadedConfig } from "./services/ConfigService";
export type { FileOpError } from "./services/FileOpsService";
export type {
  InvalidSourceDirectory,
  OrganizeOptions,
  OrganizerError,
  ScanFailed,
  ScanInterrupted,
  ScanReport
} from "./services/OrganizerService";

export const createAppLayer = () =>
  pipe(
    Layer.mergeAll(
      LoggerServiceLive,
      ConfigServiceLive,
      pipe(OrganizerServiceLive, Layer.provide(FileOpsServiceLive))
    ),
    Layer.provide(NodeContext.layer)
  );

export const AppLive = createAppLayer();
