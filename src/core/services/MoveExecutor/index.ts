export { makeMoveExecutor, toFailedOutcome, describeFileOpError } from "./MoveExecutor";
export type { MoveExecutor, MoveExecutorOptions } from "./MoveExecutor";
