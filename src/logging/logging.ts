/**
 * Structured logging
 *
 * One JSON object per line, so progress can be read by humans and tools alike.
 */

export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, error: unknown, fields?: LogFields): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  fields: LogFields;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createConsoleLogger(): Logger {
  function write(level: LogLevel, message: string, fields: LogFields = {}): void {
    const payload = {
      level,
      at: new Date().toISOString(),
      message,
      ...fields,
    };

    if (level === "error") {
      console.error(JSON.stringify(payload));
    } else {
      console.log(JSON.stringify(payload));
    }
  }

  return {
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, error, fields) =>
      write("error", message, { ...fields, error: describeError(error) }),
  };
}
