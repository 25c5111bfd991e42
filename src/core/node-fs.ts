import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import type { FileSystem } from "./interfaces";

/**
 * FileSystem backed by Node's synchronous fs API.
 * Errors are thrown as-is so callers can tell EACCES apart from other failures.
 */
export function createNodeFileSystem(): FileSystem {
  return {
    readFile(path: string): string {
      return readFileSync(path, "utf-8");
    },

    writeFile(path: string, content: string): void {
      writeFileSync(path, content, "utf-8");
    },

    exists(path: string): boolean {
      return existsSync(path);
    },

    mkdir(path: string, options?: { recursive?: boolean }): void {
      mkdirSync(path, options);
    },
  };
}
