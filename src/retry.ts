/**
 * Azure Resource Docs: Retry Utilities
 *
 * Every remote call runs as a bounded state machine:
 *
 *   attempting → succeeded
 *   attempting → transient-failure → attempting   (up to maxAttempts)
 *   attempting → exhausted | permanent-failure
 *
 * Terminal states are returned as values so callers can record a scoped
 * failure instead of unwinding. `withAzureRetry` keeps the throwing form.
 */

import { CallTimeoutError, RunCancelledError } from "./errors.js";
import type { Logger } from "./logging/index.js";
import type { RetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<RetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 4,
  minDelayMs: 200,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Azure error codes that are safe to retry.
 */
export const AZURE_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "CALL_TIMEOUT",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "ServiceTimeout",
  "RetryableError",
  "ThrottlingException",
  "RequestRateTooLarge",
  "SubscriptionRequestsThrottled",
  "ResourceGroupRequestsThrottled",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "econnreset",
  "etimedout",
  "timed out",
  "network error",
  "fetch failed",
];

export function resolveRetryConfig(options?: RetryOptions): RetryConfig {
  return {
    maxAttempts: Math.max(1, options?.maxAttempts ?? AZURE_RETRY_DEFAULTS.maxAttempts),
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };
}

// =============================================================================
// Error Inspection
// =============================================================================

function readField(source: unknown, key: string): unknown {
  if (typeof source !== "object" || source === null) return undefined;
  const value: unknown = Reflect.get(source, key);
  return value;
}

export function getErrorCode(error: unknown): string | undefined {
  const code = readField(error, "code") ?? readField(error, "Code");
  return typeof code === "string" && code.length > 0 ? code : undefined;
}

export function getErrorStatusCode(error: unknown): number | undefined {
  const status = readField(error, "statusCode") ?? readField(error, "status");
  return typeof status === "number" && status > 0 ? status : undefined;
}

function getErrorMessageText(error: unknown): string {
  if (typeof error === "string") return error;
  const message = readField(error, "message");
  return typeof message === "string" ? message : "";
}

/**
 * Determine whether an Azure error is safe to retry.
 */
export function shouldRetryAzureError(error: unknown): boolean {
  if (error === null || error === undefined) return false;
  if (error instanceof RunCancelledError) return false;
  if (error instanceof CallTimeoutError) return true;

  const code = getErrorCode(error);
  if (code && AZURE_RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors, 408 = request timeout
  const statusCode = getErrorStatusCode(error);
  if (statusCode === 429 || statusCode === 408) return true;
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) return true;

  const message = getErrorMessageText(error).toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
}

function readHeader(error: unknown, name: string): string | undefined {
  const headers = readField(error, "headers") ?? readField(readField(error, "response"), "headers");
  if (typeof headers !== "object" || headers === null) return undefined;

  // @azure/core-rest-pipeline exposes HttpHeaders with a get() accessor
  const getter: unknown = Reflect.get(headers, "get");
  if (typeof getter === "function") {
    const value: unknown = getter.call(headers, name);
    return typeof value === "string" ? value : undefined;
  }

  const value = readField(headers, name) ?? readField(headers, name.toLowerCase());
  return typeof value === "string" ? value : undefined;
}

/**
 * Extract Retry-After header value from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown, now: number = Date.now()): number | null {
  if (error === null || error === undefined) return null;

  const retryAfter = readHeader(error, "Retry-After");
  if (!retryAfter) return null;

  // Could be seconds (integer) or HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return null;
}

/**
 * Backoff before the attempt that follows `attempt`.
 */
export function computeBackoffMs(attempt: number, config: RetryConfig, error?: unknown): number {
  const retryAfterMs = getAzureRetryAfterMs(error);
  if (retryAfterMs !== null) return Math.min(retryAfterMs, config.maxDelayMs);

  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(config.minDelayMs, cappedDelay + jitter);
}

// =============================================================================
// Cancellation & Timeouts
// =============================================================================

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new RunCancelledError();
}

/**
 * Sleep for `ms`, rejecting with RunCancelledError if the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run one remote call with its own timeout. The call receives a signal that
 * fires on timeout or when the parent signal is aborted.
 */
export async function callWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  parent?: AbortSignal,
): Promise<T> {
  throwIfCancelled(parent);

  const controller = new AbortController();
  const guards: Array<Promise<never>> = [];
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  if (timeoutMs !== undefined && timeoutMs > 0) {
    guards.push(
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new CallTimeoutError(timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      }),
    );
  }

  if (parent) {
    guards.push(
      new Promise<never>((_, reject) => {
        onParentAbort = () => {
          const error = new RunCancelledError();
          controller.abort(error);
          reject(error);
        };
        parent.addEventListener("abort", onParentAbort, { once: true });
      }),
    );
  }

  try {
    return await Promise.race([fn(controller.signal), ...guards]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener("abort", onParentAbort);
  }
}

// =============================================================================
// State Machine
// =============================================================================

export type RetryOutcome<T> =
  | { status: "succeeded"; value: T; attempts: number }
  | { status: "exhausted"; error: unknown; attempts: number }
  | { status: "permanent-failure"; error: unknown; attempts: number };

export type RetryState<T> =
  | { status: "attempting"; attempt: number }
  | { status: "transient-failure"; attempt: number; error: unknown; delayMs: number }
  | RetryOutcome<T>;

export type RetryRunOptions = {
  retry?: RetryOptions;
  /** Per-call timeout. A timeout counts as a transient failure. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Observe every state the machine enters, terminal states included. */
  onTransition?: (state: RetryState<unknown>) => void;
};

/**
 * Drive one remote call through the retry state machine and return its
 * terminal state. Only cancellation is thrown.
 */
export async function runWithRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryRunOptions = {},
): Promise<RetryOutcome<T>> {
  const config = resolveRetryConfig(options.retry);
  const { signal } = options;
  let state: RetryState<T> = { status: "attempting", attempt: 1 };

  for (;;) {
    options.onTransition?.(state);

    switch (state.status) {
      case "attempting": {
        const attempt: number = state.attempt;
        try {
          const value = await callWithTimeout(fn, options.timeoutMs, signal);
          state = { status: "succeeded", value, attempts: attempt };
        } catch (error) {
          if (error instanceof RunCancelledError || signal?.aborted) throw new RunCancelledError();

          if (!shouldRetryAzureError(error)) {
            state = { status: "permanent-failure", error, attempts: attempt };
          } else if (attempt >= config.maxAttempts) {
            state = { status: "exhausted", error, attempts: attempt };
          } else {
            state = {
              status: "transient-failure",
              attempt,
              error,
              delayMs: computeBackoffMs(attempt, config, error),
            };
          }
        }
        break;
      }

      case "transient-failure":
        await sleep(state.delayMs, signal);
        state = { status: "attempting", attempt: state.attempt + 1 };
        break;

      default:
        return state;
    }
  }
}

/**
 * Execute a function with Azure-specific retry logic, throwing the last error
 * when the machine ends in a failure state.
 */
export async function withAzureRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options?: RetryRunOptions,
): Promise<T> {
  const outcome = await runWithRetry(fn, options);
  if (outcome.status === "succeeded") return outcome.value;
  throw outcome.error;
}

export type RetryRunner = <T>(operation: string, fn: (signal: AbortSignal) => Promise<T>) => Promise<RetryOutcome<T>>;

/**
 * Create a pre-configured retry runner that logs every transient failure.
 */
export function createAzureRetryRunner(options: Omit<RetryRunOptions, "onTransition"> & { logger?: Logger }): RetryRunner {
  const { logger, ...runOptions } = options;
  return (operation, fn) =>
    runWithRetry(fn, {
      ...runOptions,
      onTransition: (state) => {
        if (state.status === "transient-failure") {
          logger?.debug(`Retrying ${operation}`, {
            attempt: state.attempt,
            delayMs: Math.round(state.delayMs),
            error: formatErrorMessage(state.error),
          });
        }
      },
    });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = getErrorCode(error);
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessageText(error) || "Unknown error";

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}
