import { rulesPath, symbolsPath } from "#/config";
import { CUSTOM_LAYOUT_NAME, RULES_SHARDS } from "#/constants";
import type { XkbContext } from "#/core";
import { withFileErrors } from "#/errors";
import { childText, descendants, parseRegistry, serializeRegistry } from "#/rules/registry";

/**
 * Older installers tagged their variants with a `type` attribute, which
 * recent desktop environments reject. Remove it from every shard.
 *
 * @returns number of attributes removed
 */
export function cleanLegacyVariantTypes(ctx: XkbContext): number {
  let removed = 0;

  for (const shard of RULES_SHARDS) {
    const path = rulesPath(ctx.paths, shard);
    if (!ctx.fs.exists(path)) continue;

    removed += withFileErrors(path, "update", () => {
      const doc = parseRegistry(ctx.fs.readFile(path), path);
      const tagged = descendants(doc, "variant").filter((variant) => variant.hasAttribute("type"));
      if (tagged.length === 0) return 0;

      for (const variant of tagged) {
        variant.removeAttribute("type");
      }
      ctx.logger.info("updating file", { path });
      ctx.fs.writeFile(path, serializeRegistry(doc));
      return tagged.length;
    });
  }

  return removed;
}

/**
 * Whether a usable symbols/custom layout exists: the file is there and a
 * rules shard declares the `custom` layout.
 */
export function hasCustomSymbols(ctx: XkbContext): boolean {
  if (!ctx.fs.exists(symbolsPath(ctx.paths, CUSTOM_LAYOUT_NAME))) {
    return false;
  }

  return RULES_SHARDS.some((shard) => {
    const path = rulesPath(ctx.paths, shard);
    if (!ctx.fs.exists(path)) return false;

    const doc = withFileErrors(path, "read", () => parseRegistry(ctx.fs.readFile(path), path));
    return descendants(doc, "layout").some(
      (layout) => childText(layout, "configItem", "name") === CUSTOM_LAYOUT_NAME
    );
  });
}
