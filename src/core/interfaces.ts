/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

import type { Logger } from "#/logging";

/**
 * Synchronous text file access. Every operation of the engine goes through it,
 * so a commit never suspends between reading and rewriting a file.
 */
export interface FileSystem {
  readFile(path: string): string;
  writeFile(path: string, content: string): void;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
}

export interface XkbPaths {
  /** Directory holding `rules/` and `symbols/` */
  root: string;
  /** Whether `root` is the system-wide tree rather than the user's one */
  system: boolean;
}

export interface XkbContext {
  fs: FileSystem;
  paths: XkbPaths;
  logger: Logger;
}
