import type { FileSystem } from "#/core";
import { safeParseYaml, type ParseResult } from "#/friendly-errors";
import { LayoutDefinitionSchema, type LayoutDefinition } from "#/schemas";

/**
 * Parse a YAML layout descriptor:
 *
 * ```yaml
 * locale: fr
 * variant: ergol
 * description: French (Ergo-L)
 * body: |
 *   xkb_symbols "ergol" { ... };
 * ```
 */
export function parseLayoutDefinition(
  content: string,
  filepath?: string
): ParseResult<LayoutDefinition> {
  return safeParseYaml(content, LayoutDefinitionSchema, filepath);
}

export function readLayoutDefinition(
  fs: FileSystem,
  filepath: string
): ParseResult<LayoutDefinition> {
  if (!fs.exists(filepath)) {
    return {
      success: false,
      error: { type: "io", message: `Layout definition not found: ${filepath}` },
    };
  }
  return parseLayoutDefinition(fs.readFile(filepath), filepath);
}
