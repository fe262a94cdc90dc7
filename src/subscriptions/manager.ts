/**
 * Azure Subscription Enumerator
 *
 * Lists subscriptions and tenants via @azure/arm-subscriptions and produces
 * the root set of a traversal.
 */

import type { CredentialContext } from "../credentials/index.js";
import type { Logger } from "../logging/index.js";
import { collectAll } from "../pagination.js";
import { failureFromOutcome } from "../collector/failure-report.js";
import { createAzureRetryRunner, type RetryRunner } from "../retry.js";
import type { CollectionFailure, RetryOptions, Subscription } from "../types.js";
import type { EnumerationResult, RawSubscription, RawTenant, SubscriptionSource, TenantInfo } from "./types.js";

// =============================================================================
// SDK Adapter
// =============================================================================

type SubscriptionClient = InstanceType<typeof import("@azure/arm-subscriptions").SubscriptionClient>;

export class AzureSubscriptionSource implements SubscriptionSource {
  private client: Promise<SubscriptionClient> | null = null;

  constructor(private readonly context: CredentialContext) {}

  private getClient(): Promise<SubscriptionClient> {
    this.client ??= import("@azure/arm-subscriptions").then(
      ({ SubscriptionClient }) => new SubscriptionClient(this.context.credential),
    );
    return this.client;
  }

  async *listSubscriptions(signal: AbortSignal): AsyncIterable<RawSubscription> {
    const client = await this.getClient();
    for await (const s of client.subscriptions.list({ abortSignal: signal })) {
      yield { subscriptionId: s.subscriptionId, displayName: s.displayName, state: s.state, tenantId: s.tenantId };
    }
  }

  async getSubscription(subscriptionId: string, signal: AbortSignal): Promise<RawSubscription> {
    const client = await this.getClient();
    const s = await client.subscriptions.get(subscriptionId, { abortSignal: signal });
    return { subscriptionId: s.subscriptionId, displayName: s.displayName, state: s.state, tenantId: s.tenantId };
  }

  async *listTenants(signal: AbortSignal): AsyncIterable<RawTenant> {
    const client = await this.getClient();
    for await (const t of client.tenants.list({ abortSignal: signal })) {
      yield { tenantId: t.tenantId, displayName: t.displayName, defaultDomain: t.defaultDomain };
    }
  }
}

// =============================================================================
// Enumerator
// =============================================================================

export type SubscriptionEnumeratorOptions = {
  retry?: RetryOptions;
  callTimeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

export function toSubscription(raw: RawSubscription, fallbackId = ""): Subscription {
  const id = raw.subscriptionId || fallbackId;
  return { id, displayName: raw.displayName || id };
}

export class SubscriptionEnumerator {
  private run: RetryRunner;

  constructor(
    private readonly source: SubscriptionSource,
    private readonly options: SubscriptionEnumeratorOptions = {},
  ) {
    this.run = createAzureRetryRunner({
      retry: options.retry,
      timeoutMs: options.callTimeoutMs,
      signal: options.signal,
      logger: options.logger,
    });
  }

  /**
   * Produce the traversal root set: every accessible subscription, or the
   * explicit ids looked up one by one. An explicit id that cannot be looked up
   * becomes a subscription-scoped failure and is left out of the traversal.
   *
   * @throws when listing all subscriptions fails, since there is no root set.
   */
  async enumerate(explicitIds?: string[]): Promise<EnumerationResult> {
    const ids = [...new Set((explicitIds ?? []).map((id) => id.trim()).filter((id) => id.length > 0))];

    if (ids.length === 0) {
      const subscriptions = await this.call("list subscriptions", (signal) =>
        collectAll(this.source.listSubscriptions(signal), (s) => toSubscription(s), (s) => s.id.length > 0),
      );
      return { subscriptions, failures: [] };
    }

    const subscriptions: Subscription[] = [];
    const failures: CollectionFailure[] = [];

    for (const id of ids) {
      const outcome = await this.run(`get subscription ${id}`, (signal) => this.source.getSubscription(id, signal));
      if (outcome.status === "succeeded") {
        subscriptions.push(toSubscription(outcome.value, id));
        continue;
      }

      const failure = failureFromOutcome(outcome, "subscription", id);
      this.options.logger?.warn(`Subscription lookup failed: ${failure.message}`, { subscriptionId: id });
      failures.push(failure);
    }

    return { subscriptions, failures };
  }

  async listTenants(): Promise<TenantInfo[]> {
    return this.call("list tenants", (signal) =>
      collectAll(
        this.source.listTenants(signal),
        (t): TenantInfo => ({
          tenantId: t.tenantId ?? "",
          displayName: t.displayName || (t.tenantId ?? ""),
          defaultDomain: t.defaultDomain,
        }),
        (t) => t.tenantId.length > 0,
      ),
    );
  }

  private async call<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const outcome = await this.run(operation, fn);
    if (outcome.status === "succeeded") return outcome.value;
    throw outcome.error;
  }
}
