/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { FileSystem, XkbContext, XkbPaths } from "#/core";
import type { LogEntry, Logger } from "#/logging";

interface MockFileEntry {
  content: string;
  isDirectory: boolean;
}

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string> = {}
): FileSystem & { files: Map<string, MockFileEntry>; writes: string[] } {
  const files = new Map<string, MockFileEntry>();
  const writes: string[] = [];

  // Initialize with provided files
  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content, isDirectory: false });
  }

  return {
    files,
    writes,

    readFile(path: string): string {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw createErrnoError("ENOENT", `no such file or directory, open '${path}'`);
      }
      return entry.content;
    },

    writeFile(path: string, content: string): void {
      files.set(path, { content, isDirectory: false });
      writes.push(path);
    },

    exists(path: string): boolean {
      if (files.has(path)) return true;
      // Directories exist implicitly when they hold files
      const prefix = path.endsWith("/") ? path : `${path}/`;
      for (const filePath of files.keys()) {
        if (filePath.startsWith(prefix)) return true;
      }
      return false;
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      if (!files.has(path)) {
        files.set(path, { content: "", isDirectory: true });
      }
    },
  };
}

/**
 * Create an Error shaped like the ones thrown by Node's fs module
 */
export function createErrnoError(code: string, message: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: ${message}`);
  error.code = code;
  return error;
}

/**
 * Create a Logger recording every entry
 */
export function createMockLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  return {
    entries,

    info(message, fields = {}) {
      entries.push({ level: "info", message, fields });
    },

    warn(message, fields = {}) {
      entries.push({ level: "warn", message, fields });
    },

    error(message, error, fields = {}) {
      entries.push({
        level: "error",
        message,
        fields: { ...fields, error: error instanceof Error ? error.message : String(error) },
      });
    },
  };
}

export const TEST_XKB_ROOT = "/home/test/.config/xkb";

/**
 * Create an XkbContext over an in-memory tree rooted at TEST_XKB_ROOT
 */
export function createTestContext(
  initialFiles: Record<string, string> = {},
  paths: Partial<XkbPaths> = {}
) {
  const fs = createMockFileSystem(initialFiles);
  const logger = createMockLogger();
  const ctx: XkbContext = {
    fs,
    logger,
    paths: { root: TEST_XKB_ROOT, system: false, ...paths },
  };
  return { ctx, fs, logger };
}

/**
 * Minimal xkbConfigRegistry document holding the given layouts
 */
export function registryXml(layouts: Record<string, Record<string, string>> = {}): string {
  const layoutNodes = Object.entries(layouts).map(([locale, variants]) => {
    const variantNodes = Object.entries(variants)
      .map(
        ([name, description]) =>
          `<variant><configItem><name>${name}</name><description>${description}</description></configItem></variant>`
      )
      .join("");
    return `<layout><configItem><name>${locale}</name></configItem><variantList>${variantNodes}</variantList></layout>`;
  });

  return `<?xml version="1.0" encoding="UTF-8"?>\n<xkbConfigRegistry version="1.1"><layoutList>${layoutNodes.join("")}</layoutList></xkbConfigRegistry>\n`;
}
