import type { LayoutDefinition, LocaleId, VariantName } from "#/schemas";

// Pending change for one variant: install this layout, or remove whatever is there
export type IndexEntry =
  | { type: "install"; layout: LayoutDefinition }
  | { type: "remove" };

export type VariantEntries = Map<VariantName, IndexEntry>;

/**
 * Pending changes of one registration session, per locale.
 * Owned by the caller; emptied by a successful commit.
 */
export type LayoutIndex = Map<LocaleId, VariantEntries>;

/** What is declared on disk: locale → variant → description */
export type LayoutListing = Map<LocaleId, Map<VariantName, string>>;
