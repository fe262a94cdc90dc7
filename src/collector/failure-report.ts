/**
 * Append-only record of every scoped failure in a run.
 */

import { formatErrorMessage, getErrorCode, getErrorStatusCode, type RetryOutcome } from "../retry.js";
import type { CollectionFailure, FailureScope } from "../types.js";

export class FailureReport {
  private readonly entries: CollectionFailure[] = [];

  record(failure: CollectionFailure): void {
    this.entries.push({ ...failure });
  }

  list(): CollectionFailure[] {
    return this.entries.map((f) => ({ ...f }));
  }
}

/**
 * Turn a failed retry outcome into a failure entry.
 */
export function failureFromOutcome(
  outcome: Exclude<RetryOutcome<unknown>, { status: "succeeded" }>,
  scope: FailureScope,
  subscriptionId: string,
  resourceGroup?: string,
): CollectionFailure {
  const failure: CollectionFailure = {
    scope,
    subscriptionId,
    reason: outcome.status === "exhausted" ? "retries-exhausted" : "permanent",
    message: formatErrorMessage(outcome.error),
    attempts: outcome.attempts,
  };
  if (resourceGroup !== undefined) failure.resourceGroup = resourceGroup;
  const code = getErrorCode(outcome.error);
  if (code !== undefined) failure.code = code;
  const statusCode = getErrorStatusCode(outcome.error);
  if (statusCode !== undefined) failure.statusCode = statusCode;
  return failure;
}
