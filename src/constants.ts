/**
 * Global constants for the XKB registry engine
 */

export const DEFAULT_XKB_SYSTEM_ROOT = "/usr/share/X11/xkb";

// Metadata shards under rules/, applied in this order
export const RULES_SHARDS = ["base.xml", "evdev.xml"] as const;
export type RulesShard = (typeof RULES_SHARDS)[number];

// Directories expected in a user-scope XKB tree ('geometry' is not needed)
export const XKB_SUBDIRS = ["compat", "keycodes", "rules", "symbols", "types"] as const;

// Rulesets bootstrapped in a user-scope tree
export const BOOTSTRAP_RULESETS = ["evdev"] as const;

// Marker tags written around layout blocks in symbols/<locale>
export const MARKER_TAG = "KALAMINE";
export const LEGACY_MARKER_TAG = "LAFAYETTE";
// The legacy installer grouped its layouts in one unnamed block
export const LEGACY_VARIANT_NAME = "lafayette";

// Lines of a layout body starting with this are never written to disk
export const IGNORE_LINE_PREFIX = "//#";

// Layout that front ends use as a fallback when it is declared and installed
export const CUSTOM_LAYOUT_NAME = "custom";
