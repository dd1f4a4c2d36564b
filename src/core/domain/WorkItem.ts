import { basename } from "node:path";

/** One file to organize. Created once during enumeration and never reused. */
export interface WorkItem {
  readonly sourcePath: string;
  readonly baseDirectory: string;
}

export const makeWorkItem = (sourcePath: string, baseDirectory: string): WorkItem =>
  Object.freeze({ sourcePath, baseDirectory });

export const fileNameOf = (item: WorkItem): string => basename(item.sourcePath);
