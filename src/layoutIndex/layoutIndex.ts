import {
  LayoutDefinitionSchema,
  LocaleIdSchema,
  VariantNameSchema,
  type LayoutDefinition,
} from "#/schemas";
import type { IndexEntry, LayoutIndex } from "./layoutIndex.types";

export function createLayoutIndex(): LayoutIndex {
  return new Map();
}

function setEntry(index: LayoutIndex, locale: string, variant: string, entry: IndexEntry): void {
  let variants = index.get(locale);
  if (!variants) {
    variants = new Map();
    index.set(locale, variants);
  }
  // Last write wins, but keep the variant where it was first declared
  variants.set(variant, entry);
}

/**
 * Declare a layout to install. Throws a ZodError on an invalid definition.
 */
export function addLayout(index: LayoutIndex, layout: LayoutDefinition): void {
  const parsed = LayoutDefinitionSchema.parse(layout);
  setEntry(index, parsed.locale, parsed.variant, { type: "install", layout: parsed });
}

/**
 * Declare a layout to remove. Removing a layout that is not installed is fine.
 */
export function removeLayout(index: LayoutIndex, locale: string, variant: string): void {
  setEntry(index, LocaleIdSchema.parse(locale), VariantNameSchema.parse(variant), {
    type: "remove",
  });
}

export function countEntries(index: LayoutIndex): number {
  let count = 0;
  for (const variants of index.values()) {
    count += variants.size;
  }
  return count;
}

export function isIndexEmpty(index: LayoutIndex): boolean {
  return countEntries(index) === 0;
}

export function isInstall(
  entry: IndexEntry
): entry is Extract<IndexEntry, { type: "install" }> {
  return entry.type === "install";
}
