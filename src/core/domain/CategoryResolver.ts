import { Option } from "effect";
import type { CategoryMapping } from "./CategoryMapping";
import { extensionOf } from "./FileName";

/**
 * Category folder for a file name. Extensions compare case-insensitively;
 * names without an extension, and unmapped extensions, land in the default category.
 */
export const resolveCategory = (mapping: CategoryMapping, fileName: string): string => {
  const extension = extensionOf(fileName).toLowerCase();
  if (extension === "") {
    return mapping.defaultCategory;
  }
  return Option.getOrElse(mapping.lookupCategory(extension), () => mapping.defaultCategory);
};
