export type EntryKind = "File" | "Directory" | "SymbolicLink" | "Other";

export interface DirectoryEntry {
  readonly name: string;
  readonly kind: EntryKind;
}

/** Names Windows and macOS flag as system/hidden metadata. Compared lower-cased. */
const PLATFORM_HIDDEN_NAMES: ReadonlySet<string> = new Set(["desktop.ini", "thumbs.db", ".ds_store"]);

export const isHiddenName = (name: string): boolean =>
  name.startsWith(".") || PLATFORM_HIDDEN_NAMES.has(name.toLowerCase());

/** Only visible regular files are organized. */
export const admit = (entry: DirectoryEntry): boolean =>
  entry.kind === "File" && !isHiddenName(entry.name);
