/**
 * Error kinds raised while reading or rewriting the XKB tree.
 *
 * Permission errors are never wrapped: callers check them with
 * `isPermissionError` to suggest running with elevated privileges.
 */

export type FileAction = "read" | "write" | "update";

export class XkbError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "XkbError";
    this.path = path;
  }
}

/** Disk full, file vanished, missing directory... */
export class XkbFileError extends XkbError {
  readonly action: FileAction;

  constructor(action: FileAction, path: string, options?: { cause?: unknown }) {
    super(`Could not ${action} file ${path}`, path, options);
    this.name = "XkbFileError";
    this.action = action;
  }
}

/** Unparsable XML, or a layout node without exactly one variantList */
export class XkbFormatError extends XkbError {
  constructor(message: string, path: string) {
    super(`Unexpected XML format in ${path}: ${message}`, path);
    this.name = "XkbFormatError";
  }
}

const PERMISSION_CODES = new Set(["EACCES", "EPERM"]);

export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isPermissionError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && PERMISSION_CODES.has(code);
}

/**
 * Run the work for one file, converting failures to XkbFileError.
 * Permission errors and XkbErrors are rethrown unchanged.
 */
export function withFileErrors<T>(path: string, action: FileAction, work: () => T): T {
  try {
    return work();
  } catch (error) {
    if (isPermissionError(error) || error instanceof XkbError) {
      throw error;
    }
    throw new XkbFileError(action, path, { cause: error });
  }
}
