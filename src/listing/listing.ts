import { symbolsPath } from "#/config";
import type { XkbContext } from "#/core";
import type { LayoutListing } from "#/layoutIndex";
import { normalizeVariantName } from "#/markers";
import { listRules } from "#/rules";
import { listVariants } from "#/symbols";
import { parseMask } from "./mask";

/**
 * Every variant declared in the rules files, installed or not.
 * Compared with `listRegistered`, this reveals declared-but-missing layouts.
 */
export function listAll(ctx: XkbContext, mask = ""): LayoutListing {
  return listRules(ctx, parseMask(mask));
}

/**
 * Declared variants that also have a block in their symbols file.
 * Locales are sorted; a locale without a symbols file, or without any
 * installed variant, is left out.
 */
export function listRegistered(ctx: XkbContext, mask = ""): LayoutListing {
  const declared = listAll(ctx, mask);
  const registered: LayoutListing = new Map();

  for (const locale of [...declared.keys()].sort()) {
    const variants = declared.get(locale);
    const path = symbolsPath(ctx.paths, locale);
    if (!variants || !ctx.fs.exists(path)) continue;

    const installed = listVariants(ctx.fs, path);
    const kept = new Map(
      [...variants].filter(([name]) => installed.has(normalizeVariantName(name)))
    );
    if (kept.size > 0) registered.set(locale, kept);
  }

  return registered;
}
