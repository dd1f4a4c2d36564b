import { Option } from "effect";
import defaultTable from "./default-categories.json";

export const DEFAULT_CATEGORY = "Others";

/**
 * Read-only extension → category table, loaded once before a scan and shared by every worker.
 */
export interface CategoryMapping {
  /** Expects a lower-cased extension without the dot. */
  readonly lookupCategory: (extension: string) => Option.Option<string>;
  readonly defaultCategory: string;
  readonly size: number;
  readonly entries: ReadonlyArray<readonly [extension: string, category: string]>;
}

export const defaultCategoryTable: Readonly<Record<string, string>> = defaultTable;

export const normalizeExtension = (extension: string): string =>
  extension.trim().replace(/^\.+/, "").toLowerCase();

/** A category becomes a single folder under the source directory. */
export const isValidCategoryName = (category: string): boolean =>
  category.length > 0 &&
  category !== "." &&
  category !== ".." &&
  !/[/\\\0]/.test(category);

export const makeCategoryMapping = (
  table: Readonly<Record<string, string>>,
  defaultCategory: string = DEFAULT_CATEGORY
): CategoryMapping => {
  const byExtension = new Map<string, string>();

  for (const [rawExtension, rawCategory] of Object.entries(table)) {
    const extension = normalizeExtension(rawExtension);
    const category = rawCategory.trim();
    if (extension.length > 0 && category.length > 0) {
      byExtension.set(extension, category);
    }
  }

  const entries = Array.from(byExtension.entries());

  return {
    lookupCategory: (extension) => Option.fromNullable(byExtension.get(extension)),
    defaultCategory,
    size: byExtension.size,
    entries
  };
};

export const defaultCategoryMapping = (): CategoryMapping => makeCategoryMapping(defaultCategoryTable);
