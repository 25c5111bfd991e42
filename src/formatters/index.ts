import type { LayoutListing } from "#/layoutIndex";

/**
 * Format a layout identifier.
 *
 * @example formatLayoutId("fr", "ergol") → "fr/ergol"
 */
export function formatLayoutId(locale: string, variant: string): string {
  return `${locale}/${variant}`;
}

/**
 * Format a listing as aligned lines, one per variant.
 *
 * @example
 * fr/ergol    French (Ergo-L)
 * us/colemak  English (Colemak)
 */
export function formatLayoutListing(listing: LayoutListing): string[] {
  const rows: Array<[string, string]> = [];
  for (const [locale, variants] of listing) {
    for (const [variant, description] of variants) {
      rows.push([formatLayoutId(locale, variant), description]);
    }
  }

  const width = Math.max(0, ...rows.map(([id]) => id.length));
  return rows.map(([id, description]) => `${id.padEnd(width)}  ${description}`);
}
