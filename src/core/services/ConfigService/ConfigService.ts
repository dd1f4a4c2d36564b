/**
 * ConfigService - loads the extension → category mapping file.
 *
 * The file is JSON where whole-line `//` comments are allowed. Two shapes:
 *
 *   { "pdf": "Documents", "jpg": "Images" }
 *   { "defaultCategory": "Misc", "categories": { "pdf": "Documents" } }
 *
 * A missing file is created with the default table. A file with no usable
 * mappings falls back to the default table.
 */

import { Context, Data, Effect, Layer, Predicate, Schema, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import {
  DEFAULT_CATEGORY,
  defaultCategoryMapping,
  defaultCategoryTable,
  isValidCategoryName,
  makeCategoryMapping,
  type CategoryMapping
} from "@domain/CategoryMapping";

export class ConfigLoadError extends Data.TaggedError("ConfigLoadError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export interface LoadedConfig {
  readonly path: string;
  readonly mapping: CategoryMapping;
  /** The file did not exist and was written with the defaults. */
  readonly created: boolean;
  /** The file had no usable mappings, so the default table is in effect. */
  readonly usedDefaults: boolean;
}

export interface ConfigService {
  readonly load: (path: string) => Effect.Effect<LoadedConfig, ConfigLoadError>;
}

export class ConfigServiceTag extends Context.Tag("ConfigService")<ConfigServiceTag, ConfigService>() {}

// =============================================================================
// File format
// =============================================================================

const CategoryTable = Schema.Record({ key: Schema.String, value: Schema.String });

const StructuredConfig = Schema.Struct({
  defaultCategory: Schema.optional(Schema.String),
  categories: CategoryTable
});

interface ParsedConfig {
  readonly table: Readonly<Record<string, string>>;
  readonly defaultCategory: string;
}

export const stripLineComments = (text: string): string =>
  text
    .split(/\r?\n/)
    .filter((line) => !line.trim().startsWith("//"))
    .join("\n");

const decodeConfig = (raw: unknown) =>
  Predicate.hasProperty(raw, "categories")
    ? pipe(
        Schema.decodeUnknown(StructuredConfig)(raw),
        Effect.map(
          (config): ParsedConfig => ({
            table: config.categories,
            defaultCategory: config.defaultCategory?.trim() || DEFAULT_CATEGORY
          })
        )
      )
    : pipe(
        Schema.decodeUnknown(CategoryTable)(raw),
        Effect.map((table): ParsedConfig => ({ table, defaultCategory: DEFAULT_CATEGORY }))
      );

const validateCategories = (path: string, parsed: ParsedConfig): Effect.Effect<void, ConfigLoadError> => {
  if (!isValidCategoryName(parsed.defaultCategory)) {
    return Effect.fail(
      new ConfigLoadError({ path, reason: `Invalid default category "${parsed.defaultCategory}"` })
    );
  }

  const invalid = Object.entries(parsed.table).find(([, category]) => {
    const trimmed = category.trim();
    return trimmed.length > 0 && !isValidCategoryName(trimmed);
  });

  return invalid
    ? Effect.fail(
        new ConfigLoadError({
          path,
          reason: `Invalid category "${invalid[1]}" for extension "${invalid[0]}": categories must be plain folder names`
        })
      )
    : Effect.void;
};

export const renderDefaultConfig = (): string => {
  const entries = Object.entries(defaultCategoryTable);
  const lines = ["{", `  // Extension → category folder. Anything else goes to "${DEFAULT_CATEGORY}".`];

  entries.forEach(([extension, category], index) => {
    const previous = entries[index - 1];
    if (previous?.[1] !== category) {
      lines.push("", `  // ${category}`);
    }
    const comma = index < entries.length - 1 ? "," : "";
    lines.push(`  ${JSON.stringify(extension)}: ${JSON.stringify(category)}${comma}`);
  });

  lines.push("}", "");
  return lines.join("\n");
};

// =============================================================================
// Live implementation (uses @effect/platform FileSystem)
// =============================================================================

export const ConfigServiceLive = Layer.effect(
  ConfigServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const load: ConfigService["load"] = (path) =>
      Effect.gen(function* () {
        const fail = (reason: string) => new ConfigLoadError({ path, reason });

        const exists = yield* pipe(
          fs.exists(path),
          Effect.mapError((e) => fail(e.message))
        );

        if (!exists) {
          yield* Effect.logDebug(`No config at ${path}, writing defaults`);
          yield* pipe(
            fs.writeFileString(path, renderDefaultConfig()),
            Effect.mapError((e) => fail(`Could not create default config: ${e.message}`))
          );
          return { path, mapping: defaultCategoryMapping(), created: true, usedDefaults: true };
        }

        const text = yield* pipe(
          fs.readFileString(path),
          Effect.mapError((e) => fail(e.message))
        );

        const raw = yield* Effect.try({
          try: (): unknown => JSON.parse(stripLineComments(text)),
          catch: (e) => fail(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`)
        });

        const parsed = yield* pipe(
          decodeConfig(raw),
          Effect.mapError((e) => fail(e.message))
        );

        yield* validateCategories(path, parsed);

        const mapping = makeCategoryMapping(parsed.table, parsed.defaultCategory);
        if (mapping.size === 0) {
          yield* Effect.logDebug(`${path} has no mappings, using defaults`);
          return {
            path,
            mapping: makeCategoryMapping(defaultCategoryTable, parsed.defaultCategory),
            created: false,
            usedDefaults: true
          };
        }

        return { path, mapping, created: false, usedDefaults: false };
      });

    return { load };
  })
);
