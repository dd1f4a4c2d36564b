export interface FileNameParts {
  readonly stem: string;
  /** Includes the leading dot, or is empty when the name has no extension. */
  readonly extension: string;
}

/**
 * Index of the dot that starts the extension, or -1.
 * A dot in first position marks a hidden file and a trailing dot has nothing after it,
 * so neither starts an extension.
 */
const extensionDotIndex = (name: string): number => {
  const index = name.lastIndexOf(".");
  return index > 0 && index < name.length - 1 ? index : -1;
};

export const extensionOf = (name: string): string => {
  const index = extensionDotIndex(name);
  return index === -1 ? "" : name.slice(index + 1);
};

export const splitFileName = (name: string): FileNameParts => {
  const index = extensionDotIndex(name);
  return index === -1
    ? { stem: name, extension: "" }
    : { stem: name.slice(0, index), extension: name.slice(index) };
};
