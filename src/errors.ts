/**
 * Error types shared by every pipeline stage.
 */

export type DocgenErrorCode =
  | "INVARIANT_VIOLATION"
  | "RUN_CANCELLED"
  | "CALL_TIMEOUT"
  | "PAGINATION_CURSOR_REPEATED"
  | "CONFIG_INVALID"
  | "EXPORT_INVALID"
  | "AUTHENTICATION_FAILED";

export class DocgenError extends Error {
  constructor(
    message: string,
    public readonly code: DocgenErrorCode,
  ) {
    super(message);
    this.name = "DocgenError";
  }
}

/** The snapshot breaks a structural rule (duplicate id, dangling reference, path clash). */
export class InvariantViolationError extends DocgenError {
  constructor(
    message: string,
    public readonly violations: string[],
  ) {
    super(message, "INVARIANT_VIOLATION");
    this.name = "InvariantViolationError";
  }
}

export class RunCancelledError extends DocgenError {
  constructor(message = "Run cancelled") {
    super(message, "RUN_CANCELLED");
    this.name = "RunCancelledError";
  }
}

/** A single remote call exceeded its timeout. Retried like throttling. */
export class CallTimeoutError extends DocgenError {
  constructor(public readonly timeoutMs: number) {
    super(`Remote call timed out after ${timeoutMs}ms`, "CALL_TIMEOUT");
    this.name = "CallTimeoutError";
  }
}

export class PaginationCursorError extends DocgenError {
  constructor(public readonly continuationToken: string) {
    super(`Continuation token repeated: ${continuationToken}`, "PAGINATION_CURSOR_REPEATED");
    this.name = "PaginationCursorError";
  }
}

export class ConfigError extends DocgenError {
  constructor(
    message: string,
    public readonly errors: string[] = [],
  ) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export class ExportFormatError extends DocgenError {
  constructor(
    message: string,
    public readonly errors: string[] = [],
  ) {
    super(message, "EXPORT_INVALID");
    this.name = "ExportFormatError";
  }
}

export class AuthenticationError extends DocgenError {
  constructor(message: string) {
    super(message, "AUTHENTICATION_FAILED");
    this.name = "AuthenticationError";
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof RunCancelledError;
}
