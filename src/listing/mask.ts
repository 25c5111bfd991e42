/**
 * Layout masks
 *
 * Supported formats:
 * - `` or `*` → every layout
 * - `fr` → every variant of locale fr
 * - `fr/ergol` → one variant
 * - `*` as either segment matches anything; an empty segment matches nothing
 */

export const ANY = "*";

export interface LayoutMask {
  locale: string;
  variant: string;
}

export function parseMask(mask = ""): LayoutMask {
  if (mask === "" || mask === ANY) {
    return { locale: ANY, variant: ANY };
  }

  const slashIndex = mask.indexOf("/");
  if (slashIndex === -1) {
    return { locale: mask, variant: ANY };
  }

  return {
    locale: mask.slice(0, slashIndex),
    variant: mask.slice(slashIndex + 1),
  };
}

export function matchesMask(mask: LayoutMask, locale: string, variant: string): boolean {
  return (
    (mask.locale === ANY || mask.locale === locale) &&
    (mask.variant === ANY || mask.variant === variant)
  );
}
