/**
 * Friendly Errors
 *
 * Standard utilities turning parse failures and XKB file errors into
 * human-readable messages.
 *
 * USAGE: front ends print `message`, then each of `details` indented.
 *
 * @example
 * ```ts
 * try {
 *   commitIndex(ctx, index);
 * } catch (err) {
 *   const friendly = toFriendlyError(err);
 *   console.error(friendly.message);
 *   friendly.details?.forEach(d => console.error(`  ${d}`));
 *   process.exit(1);
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import { ZodError, type ZodType, type ZodTypeDef } from "zod";
import { XkbError, XkbFileError, XkbFormatError, isPermissionError } from "#/errors";

export type ParseErrorType = "yaml" | "validation";

export type FriendlyErrorType = ParseErrorType | "permission" | "io" | "format" | "unknown";

export interface FriendlyError {
  type: FriendlyErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // Keep the first line: the rest is a code frame
  return error.message.split("\n")[0] ?? error.message;
}

function describeCause(error: XkbError): string[] | undefined {
  if (error.cause === undefined) return undefined;
  return [error.cause instanceof Error ? error.cause.message : String(error.cause)];
}

/**
 * Parse YAML content and validate against a Zod schema.
 * Returns a result object with friendly error messages.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  // Step 1: Parse YAML
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  // Step 2: Validate with Zod
  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid layout definition${fileContext}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Convert anything thrown by the engine into a FriendlyError.
 */
export function toFriendlyError(error: unknown): FriendlyError {
  if (isPermissionError(error)) {
    return {
      type: "permission",
      message: "Permission denied",
      details: [
        error instanceof Error ? error.message : String(error),
        "System-wide layouts require elevated privileges",
      ],
    };
  }

  if (error instanceof XkbFormatError) {
    return { type: "format", message: error.message };
  }

  if (error instanceof XkbFileError) {
    return { type: "io", message: error.message, details: describeCause(error) };
  }

  if (error instanceof ZodError) {
    return {
      type: "validation",
      message: "Invalid layout definition",
      details: formatZodIssues(error),
    };
  }

  return {
    type: "unknown",
    message: error instanceof Error ? error.message : String(error),
  };
}
