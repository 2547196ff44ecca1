/**
 * Structured error types for line counting
 */

/** Error codes */
export type LineFreqErrorCode =
  | "NotFound"
  | "ReadError"
  | "WriteError"
  | "LockPoisoned"
  | "ChannelClosed"
  | "InvalidOption";

/** Step of a run that failed */
export type LineFreqOperation =
  | "open"
  | "count"
  | "produce"
  | "increment"
  | "write"
  | "send"
  | "configure";

/** Plain-object view of an error, safe to serialize */
export interface LineFreqErrorInfo {
  code: LineFreqErrorCode;
  operation: LineFreqOperation;
  message: string;
  /** File involved, if any */
  path?: string;
}

export class LineFreqError extends Error {
  readonly code: LineFreqErrorCode;
  readonly operation: LineFreqOperation;
  readonly path?: string;

  constructor(
    code: LineFreqErrorCode,
    operation: LineFreqOperation,
    message: string,
    options: { path?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "LineFreqError";
    this.code = code;
    this.operation = operation;
    this.path = options.path;
  }

  toJSON(): LineFreqErrorInfo {
    const info: LineFreqErrorInfo = {
      code: this.code,
      operation: this.operation,
      message: this.message,
    };
    if (this.path !== undefined) info.path = this.path;
    return info;
  }
}

/** Node system errors carry a string `code` such as ENOENT */
function systemCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an I/O failure in a LineFreqError for the given operation.
 */
export function toLineFreqError(
  error: unknown,
  operation: LineFreqOperation,
  path?: string
): LineFreqError {
  if (error instanceof LineFreqError) return error;

  const target = path ? ` ${path}` : "";

  if (systemCode(error) === "ENOENT") {
    const code = operation === "write" ? "WriteError" : "NotFound";
    const message =
      code === "NotFound"
        ? `File not found:${target}`
        : `Failed to ${operation}${target}: ${describe(error)}`;
    return new LineFreqError(code, operation, message, { path, cause: error });
  }

  const code = operation === "write" ? "WriteError" : "ReadError";
  return new LineFreqError(code, operation, `Failed to ${operation}${target}: ${describe(error)}`, {
    path,
    cause: error,
  });
}
