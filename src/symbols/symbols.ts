/**
 * Definitions store: XKB/symbols/<locale>
 *
 * Layout blocks are edited in place; everything outside the blocks being
 * replaced is left byte-for-byte as it was.
 */

import { basename } from "path";
import { symbolsPath } from "#/config";
import { IGNORE_LINE_PREFIX } from "#/constants";
import type { FileSystem, XkbContext } from "#/core";
import { withFileErrors } from "#/errors";
import { isInstall, type LayoutIndex, type VariantEntries } from "#/layoutIndex";
import {
  closesBlock,
  createMarker,
  normalizeVariantName,
  parseBeginMarker,
  type BlockMarker,
} from "#/markers";
import type { SymbolsUpdate } from "./symbols.types";

function splitLines(content: string): string[] {
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function renderBlock(name: string, body: string): string {
  const marker = createMarker(name);
  const lines = body.split("\n").filter((line) => !line.startsWith(IGNORE_LINE_PREFIX));
  return [marker.begin, lines.join("\n").trimEnd(), marker.end].join("\n");
}

/**
 * Drop the blocks named in `entries`, then append one block per install entry.
 *
 * Begin markers of other names are plain lines. A dropped block takes the
 * blank lines that follow it along, so removing a block between two others
 * keeps a single blank line between them. Chunks are
 * separated by one blank line and the result ends with a single newline.
 */
export function rewriteSymbols(content: string, entries: VariantEntries): string {
  if (entries.size === 0) return content;

  const targets = new Set([...entries.keys()].map(normalizeVariantName));
  const kept: string[] = [];
  let open: BlockMarker | undefined;
  let skipBlankLines = false;

  for (const line of splitLines(content)) {
    if (open) {
      if (closesBlock(open, line)) {
        open = undefined;
        skipBlankLines = true;
      }
      continue;
    }

    const marker = parseBeginMarker(line);
    if (marker && targets.has(marker.name)) {
      open = marker;
      continue;
    }

    if (skipBlankLines && line.trim() === "") continue;
    skipBlankLines = false;
    kept.push(line);
  }

  const chunks: string[] = [];
  const untouched = kept.join("\n").trimEnd();
  if (untouched) chunks.push(untouched);

  for (const [name, entry] of entries) {
    if (isInstall(entry)) {
      chunks.push(renderBlock(name, entry.layout.body));
    }
  }

  return chunks.length > 0 ? `${chunks.join("\n\n")}\n` : "";
}

/**
 * Apply the pending entries of one locale to its symbols file.
 * A missing file is created; an unchanged file is not rewritten.
 */
export function upsertBlocks(
  ctx: XkbContext,
  path: string,
  entries: VariantEntries
): SymbolsUpdate {
  const locale = basename(path);
  const update: SymbolsUpdate = { path, locale, installed: [], removed: [], changed: false };

  withFileErrors(path, "update", () => {
    const exists = ctx.fs.exists(path);
    const current = exists ? ctx.fs.readFile(path) : "";
    const next = rewriteSymbols(current, entries);

    if (!exists || next !== current) {
      ctx.fs.writeFile(path, next);
      update.changed = true;
    }
  });

  for (const [name, entry] of entries) {
    if (isInstall(entry)) {
      update.installed.push(name);
      ctx.logger.info("variant installed", { locale, variant: name });
    } else {
      update.removed.push(name);
      ctx.logger.info("variant removed", { locale, variant: name });
    }
  }

  return update;
}

/**
 * Names of all marked blocks in a symbols file, normalized for lookup.
 */
export function listVariants(fs: FileSystem, path: string): Set<string> {
  const content = withFileErrors(path, "read", () => fs.readFile(path));
  const names = new Set<string>();

  for (const line of splitLines(content)) {
    const marker = parseBeginMarker(line);
    if (marker) names.add(marker.name);
  }

  return names;
}

/**
 * Rewrite symbols/<locale> once for each locale of the index.
 */
export function updateSymbols(ctx: XkbContext, index: LayoutIndex): SymbolsUpdate[] {
  const updates: SymbolsUpdate[] = [];

  for (const [locale, entries] of index) {
    const path = symbolsPath(ctx.paths, locale);
    ctx.logger.info("updating file", { path });
    updates.push(upsertBlocks(ctx, path, entries));
  }

  return updates;
}
