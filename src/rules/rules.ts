/**
 * Metadata tree: XKB/rules/{base,evdev}.xml
 *
 * Desktop environments list layouts from these files, so a variant missing
 * here cannot be selected even when its symbols are installed.
 *
 *   <layout>
 *     <configItem><name>fr</name></configItem>
 *     <variantList>
 *       <variant>
 *         <configItem>
 *           <name>ergol</name>
 *           <description>French (Ergo-L)</description>
 *         </configItem>
 *       </variant>
 *     </variantList>
 *   </layout>
 */

import { rulesPath } from "#/config";
import { RULES_SHARDS } from "#/constants";
import type { XkbContext } from "#/core";
import { XkbFormatError, withFileErrors } from "#/errors";
import { isInstall, type LayoutIndex, type LayoutListing } from "#/layoutIndex";
import { matchesMask, type LayoutMask } from "#/listing/mask";
import {
  childElements,
  childText,
  createElement,
  descendants,
  isElement,
  parseRegistry,
  serializeRegistry,
} from "./registry";

function layoutName(layout: Element): string | undefined {
  return childText(layout, "configItem", "name");
}

/**
 * Find the layout node of a locale, appending an empty one to the
 * layoutList when there is none.
 */
export function locateOrCreateLocale(doc: Document, locale: string, path: string): Element {
  const existing = descendants(doc, "layout").find((layout) => layoutName(layout) === locale);
  if (existing) return existing;

  const layoutList = descendants(doc, "layoutList")[0];
  if (!layoutList) {
    throw new XkbFormatError("no layoutList element", path);
  }

  const layout = createElement(
    doc,
    "layout",
    createElement(doc, "configItem", createElement(doc, "name", locale)),
    createElement(doc, "variantList")
  );
  layoutList.appendChild(layout);
  return layout;
}

export function getVariantList(layout: Element, path: string): Element {
  const lists = childElements(layout, "variantList");
  const [variantList] = lists;
  if (lists.length !== 1 || !variantList) {
    const locale = layoutName(layout) ?? "?";
    throw new XkbFormatError(
      `layout "${locale}" has ${lists.length} variantList elements, expected 1`,
      path
    );
  }
  return variantList;
}

export function removeVariant(variantList: Element, name: string): void {
  for (const variant of childElements(variantList, "variant")) {
    if (childText(variant, "configItem", "name") === name) {
      variantList.removeChild(variant);
    }
  }
}

/**
 * Replace-by-append: an updated variant moves to the end of the list.
 */
export function upsertVariant(variantList: Element, name: string, description: string): void {
  removeVariant(variantList, name);
  const doc = variantList.ownerDocument;
  variantList.appendChild(
    createElement(
      doc,
      "variant",
      createElement(
        doc,
        "configItem",
        createElement(doc, "name", name),
        createElement(doc, "description", description)
      )
    )
  );
}

/**
 * Apply every pending entry to one registry document.
 * Returns whether any locale was touched.
 */
export function applyIndexToRegistry(doc: Document, index: LayoutIndex, path: string): boolean {
  let touched = false;

  for (const [locale, entries] of index) {
    const variantList = getVariantList(locateOrCreateLocale(doc, locale, path), path);

    for (const [name, entry] of entries) {
      removeVariant(variantList, name);
      if (isInstall(entry)) {
        upsertVariant(variantList, name, entry.layout.description);
      }
    }
    touched = true;
  }

  return touched;
}

/**
 * Update every existing shard independently. A locale only present in one
 * shard is only changed there; a shard written before a failure stays written.
 *
 * @returns paths of the shards written
 */
export function updateRules(ctx: XkbContext, index: LayoutIndex): string[] {
  const written: string[] = [];

  for (const shard of RULES_SHARDS) {
    const path = rulesPath(ctx.paths, shard);
    if (!ctx.fs.exists(path)) {
      ctx.logger.warn("skipping missing rules file", { path });
      continue;
    }

    ctx.logger.info("updating file", { path });
    const changed = withFileErrors(path, "update", () => {
      const doc = parseRegistry(ctx.fs.readFile(path), path);
      if (!applyIndexToRegistry(doc, index, path)) return false;
      ctx.fs.writeFile(path, serializeRegistry(doc));
      return true;
    });

    if (changed) written.push(path);
  }

  return written;
}

/**
 * Every declared variant matching `mask`, across all shards.
 */
export function listRules(ctx: XkbContext, mask: LayoutMask): LayoutListing {
  const listing: LayoutListing = new Map();

  for (const shard of RULES_SHARDS) {
    const path = rulesPath(ctx.paths, shard);
    if (!ctx.fs.exists(path)) continue;

    const doc = withFileErrors(path, "read", () => parseRegistry(ctx.fs.readFile(path), path));

    for (const variant of descendants(doc, "variant")) {
      // variant → variantList → layout
      const layout = variant.parentNode?.parentNode;
      if (!layout || !isElement(layout)) continue;

      const locale = layoutName(layout);
      const name = childText(variant, "configItem", "name");
      if (locale === undefined || name === undefined) continue;
      if (!matchesMask(mask, locale, name)) continue;

      let variants = listing.get(locale);
      if (!variants) {
        variants = new Map();
        listing.set(locale, variants);
      }
      variants.set(name, childText(variant, "configItem", "description") ?? "");
    }
  }

  return listing;
}
