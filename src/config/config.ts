/**
 * Configuration
 *
 * Resolves where the XKB tree lives from the environment, and wires the
 * production context.
 */

import { homedir } from "os";
import { join } from "path";
import { createNodeFileSystem, type FileSystem, type XkbContext, type XkbPaths } from "#/core";
import { DEFAULT_XKB_SYSTEM_ROOT, type RulesShard } from "#/constants";
import { createConsoleLogger, type Logger } from "#/logging";
import { XkbEnvSchema, type XkbEnv } from "#/schemas";

export interface ResolvePathsOptions {
  /** Use the system-wide tree instead of the user's one */
  system?: boolean;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export interface CreateContextOptions extends ResolvePathsOptions {
  fs?: FileSystem;
  logger?: Logger;
}

export function parseXkbEnv(env: NodeJS.ProcessEnv = process.env): XkbEnv {
  return XkbEnvSchema.parse(env);
}

/**
 * User scope: $XDG_CONFIG_HOME/xkb (default ~/.config/xkb).
 * System scope: $XKB_CONFIG_ROOT (default /usr/share/X11/xkb).
 */
export function resolveXkbPaths(options: ResolvePathsOptions = {}): XkbPaths {
  const env = parseXkbEnv(options.env);
  const system = options.system ?? false;

  if (system) {
    return { root: env.XKB_CONFIG_ROOT ?? DEFAULT_XKB_SYSTEM_ROOT, system };
  }

  const configHome = env.XDG_CONFIG_HOME ?? join(options.homeDir ?? homedir(), ".config");
  return { root: join(configHome, "xkb"), system };
}

/**
 * Wayland compositors read the user-scope tree; X11 only reads the system one.
 */
export function isWaylandSession(env: NodeJS.ProcessEnv = process.env): boolean {
  const sessionType = parseXkbEnv(env).XDG_SESSION_TYPE;
  return sessionType !== undefined && sessionType.startsWith("wayland");
}

export function rulesPath(paths: XkbPaths, file: RulesShard | string): string {
  return join(paths.root, "rules", file);
}

export function symbolsPath(paths: XkbPaths, locale: string): string {
  return join(paths.root, "symbols", locale);
}

export function createXkbContext(options: CreateContextOptions = {}): XkbContext {
  return {
    fs: options.fs ?? createNodeFileSystem(),
    paths: resolveXkbPaths(options),
    logger: options.logger ?? createConsoleLogger(),
  };
}
