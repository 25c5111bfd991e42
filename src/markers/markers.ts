/**
 * Block markers
 *
 * Layouts are written to symbols/<locale> between a pair of comment lines:
 *
 *   // KALAMINE::ERGOL::BEGIN
 *   xkb_symbols "ergol" { ... };
 *   // KALAMINE::ERGOL::END
 *
 * An earlier installer grouped its layouts in a single block without a name:
 *
 *   // LAFAYETTE::BEGIN
 *   xkb_symbols "lafayette"   { ... };
 *   xkb_symbols "lafayette42" { ... };
 *   // LAFAYETTE::END
 *
 * That block is known as "lafayette", so both layouts are removed together.
 * The legacy end line does not share the current prefix, hence a block is only
 * closed by the end line derived from its own begin line.
 */

import { LEGACY_MARKER_TAG, LEGACY_VARIANT_NAME, MARKER_TAG } from "#/constants";
import type { BlockMarker, MarkerFormat } from "./markers.types";

const BEGIN_SUFFIX = "::BEGIN";
const END_SUFFIX = "::END";

interface MarkerSyntax {
  format: MarkerFormat;
  match(line: string): BlockMarker | undefined;
}

const CURRENT_BEGIN = new RegExp(`^// ${MARKER_TAG}::(.+)${BEGIN_SUFFIX}$`);
const LEGACY_BEGIN = `// ${LEGACY_MARKER_TAG}${BEGIN_SUFFIX}`;

const MARKER_SYNTAXES: readonly MarkerSyntax[] = [
  {
    format: "current",
    match(line) {
      const match = CURRENT_BEGIN.exec(line);
      const rawName = match?.[1];
      if (rawName === undefined) return undefined;
      return {
        format: "current",
        name: normalizeVariantName(rawName),
        begin: line,
        end: `// ${MARKER_TAG}::${rawName}${END_SUFFIX}`,
      };
    },
  },
  {
    format: "legacy",
    match(line) {
      if (line !== LEGACY_BEGIN) return undefined;
      return {
        format: "legacy",
        name: LEGACY_VARIANT_NAME,
        begin: line,
        end: `// ${LEGACY_MARKER_TAG}${END_SUFFIX}`,
      };
    },
  },
];

/**
 * Marker names are written upper-case; going through upper case before
 * lowering keeps names like "straße" equal to what a marker line stores.
 */
export function normalizeVariantName(name: string): string {
  return name.toUpperCase().toLowerCase();
}

/** Trailing whitespace (and CR) never takes part in marker matching */
function markerText(line: string): string {
  return line.trimEnd();
}

export function parseBeginMarker(line: string): BlockMarker | undefined {
  const text = markerText(line);
  if (!text.endsWith(BEGIN_SUFFIX)) return undefined;

  for (const syntax of MARKER_SYNTAXES) {
    const marker = syntax.match(text);
    if (marker) return marker;
  }
  return undefined;
}

export function isEndMarker(line: string): boolean {
  return markerText(line).endsWith(END_SUFFIX);
}

/**
 * Whether `line` closes the block opened by `marker`.
 * Any other line, even one that looks like an end marker, is block content.
 */
export function closesBlock(marker: BlockMarker, line: string): boolean {
  return isEndMarker(line) && markerText(line) === marker.end;
}

/** Marker pair for a block written by this engine */
export function createMarker(name: string): BlockMarker {
  const tagged = `// ${MARKER_TAG}::${name.toUpperCase()}`;
  return {
    format: "current",
    name: normalizeVariantName(name),
    begin: `${tagged}${BEGIN_SUFFIX}`,
    end: `${tagged}${END_SUFFIX}`,
  };
}
