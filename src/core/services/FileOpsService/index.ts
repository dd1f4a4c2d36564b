export {
  FileOpsServiceTag,
  FileOpsServiceLive,
  FileOpNotFound,
  FileOpAlreadyExists,
  FileOpPermissionDenied,
  FileOpCrossDevice,
  FileOpNotADirectory,
  FileOpFailed,
  toFileOpError
} from "./FileOpsService";
export type { FileOpsService, FileOpError, FileStat } from "./FileOpsService";
