export {
  OrganizerServiceTag,
  OrganizerServiceLive,
  InvalidSourceDirectory,
  ScanFailed,
  ScanInterrupted,
  DEFAULT_CONCURRENCY,
  DEFAULT_TIMEOUT
} from "./OrganizerService";
export type {
  OrganizerService,
  OrganizerError,
  OrganizeOptions,
  ScanReport,
  InvalidSourceReason
} from "./OrganizerService";
