/**
 * User-scope bootstrap
 *
 * Wayland compositors read $XDG_CONFIG_HOME/xkb, which starts out empty.
 * Rules there include the system ones, so only our additions are stored.
 */

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { rulesPath } from "#/config";
import { BOOTSTRAP_RULESETS, XKB_SUBDIRS } from "#/constants";
import type { XkbContext } from "#/core";
import { withFileErrors } from "#/errors";

const TEMPLATES_DIR = join(dirname(fileURLToPath(import.meta.url)), "templates");

/** Rules file including the system ruleset of the same name */
export function getRulesTemplate(ruleset: string): string {
  return readFileSync(join(TEMPLATES_DIR, "rules.tmpl"), "utf-8").replaceAll(
    "{{ruleset}}",
    ruleset
  );
}

/** xkbConfigRegistry document with an empty layoutList */
export function getRegistryTemplate(): string {
  return readFileSync(join(TEMPLATES_DIR, "registry.xml"), "utf-8");
}

/**
 * Create the user-scope XKB tree if needed. Existing files are never
 * overwritten; the system tree is left alone.
 *
 * @returns paths created
 */
export function ensureXkbConfigIsReady(ctx: XkbContext): string[] {
  if (ctx.paths.system) return [];

  const created: string[] = [];
  const { fs, paths } = ctx;

  for (const dir of [paths.root, ...XKB_SUBDIRS.map((subdir) => join(paths.root, subdir))]) {
    if (fs.exists(dir)) continue;
    withFileErrors(dir, "write", () => fs.mkdir(dir, { recursive: true }));
    created.push(dir);
  }

  for (const ruleset of BOOTSTRAP_RULESETS) {
    const files = [
      { path: rulesPath(paths, ruleset), content: getRulesTemplate(ruleset) },
      { path: rulesPath(paths, `${ruleset}.xml`), content: getRegistryTemplate() },
    ];

    for (const { path, content } of files) {
      if (fs.exists(path)) continue;
      withFileErrors(path, "write", () => fs.writeFile(path, content));
      created.push(path);
    }
  }

  for (const path of created) {
    ctx.logger.info("created", { path });
  }
  return created;
}
