/**
 * Azure Resource Collector
 *
 * Walks subscription → resource group → resource for a set of subscriptions.
 * Each page fetch is one retried call; scopes that cannot be listed become
 * entries of the failure report. Only cancellation propagates.
 */

import { PromisePool } from "@supercharge/promise-pool";
import { PaginationCursorError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { collectPages } from "../pagination.js";
import type { RawResourceGroup, ResourceSource } from "../resources/index.js";
import { createAzureRetryRunner, formatErrorMessage, throwIfCancelled, type RetryOutcome, type RetryRunner } from "../retry.js";
import {
  UNKNOWN,
  type CollectionFailure,
  type Page,
  type RawResource,
  type ResourceGroup,
  type RetryOptions,
  type Subscription,
} from "../types.js";
import { FailureReport, failureFromOutcome } from "./failure-report.js";

// =============================================================================
// Types
// =============================================================================

export type CollectedResource = {
  subscriptionId: string;
  resourceGroupId: string;
  raw: RawResource;
};

export type CollectionResult = {
  subscriptions: Subscription[];
  /** Groups whose resources were listed completely. */
  resourceGroups: ResourceGroup[];
  resources: CollectedResource[];
  failures: CollectionFailure[];
};

export type CollectionProgress = {
  completedGroups: number;
  totalGroups: number;
  failedGroups: number;
  subscriptionId: string;
  resourceGroup: string;
};

export type CollectorOptions = {
  /** Upper bound on remote calls in flight. */
  concurrency?: number;
  retry?: RetryOptions;
  callTimeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  /** Api version for a full by-id fetch of the given type, if any. */
  detailApiVersion?: (type: string) => string | undefined;
  onProgress?: (event: CollectionProgress) => void;
};

type FailedOutcome = Exclude<RetryOutcome<unknown>, { status: "succeeded" }>;

/** Carries a failed page outcome out of a pagination loop. */
class ScopeFailure extends Error {
  constructor(readonly outcome: FailedOutcome) {
    super(formatErrorMessage(outcome.error));
    this.name = "ScopeFailure";
  }
}

type GroupTask = { subscription: Subscription; group: ResourceGroup };

export const DEFAULT_CONCURRENCY = 8;

// =============================================================================
// Collector
// =============================================================================

export class ResourceCollector {
  private readonly run: RetryRunner;
  private readonly concurrency: number;

  constructor(
    private readonly source: ResourceSource,
    private readonly options: CollectorOptions = {},
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.run = createAzureRetryRunner({
      retry: options.retry,
      timeoutMs: options.callTimeoutMs,
      signal: options.signal,
      logger: options.logger,
    });
  }

  async collect(subscriptions: Subscription[]): Promise<CollectionResult> {
    const { signal, logger } = this.options;
    const report = new FailureReport();
    throwIfCancelled(signal);

    // Failures are kept per task and reported in task order, not completion order.
    const subscriptionFailures: (CollectionFailure | undefined)[] = subscriptions.map(() => undefined);

    // Level 1: resource groups per subscription
    const groupsBySubscription: ResourceGroup[][] = subscriptions.map(() => []);
    await PromisePool.for(subscriptions)
      .withConcurrency(this.concurrency)
      .handleError(async (error) => {
        throw error;
      })
      .process(async (subscription, index) => {
        const outcome = await this.listAll(`list resource groups of ${subscription.id}`, (token, s) =>
          this.source.listResourceGroupsPage(subscription.id, token, s),
        );
        if (outcome.status !== "succeeded") {
          const failure = failureFromOutcome(outcome, "subscription", subscription.id);
          logger?.warn(`Resource group listing failed: ${failure.message}`, { subscriptionId: subscription.id });
          subscriptionFailures[index] = failure;
          return;
        }
        groupsBySubscription[index] = this.toResourceGroups(subscription, outcome.value);
      });

    // Level 2: resources per group
    const tasks: GroupTask[] = subscriptions.flatMap((subscription, index) =>
      groupsBySubscription[index].map((group) => ({ subscription, group })),
    );
    const resourcesByTask: CollectedResource[][] = tasks.map(() => []);
    const succeeded: boolean[] = tasks.map(() => false);
    const groupFailures: (CollectionFailure | undefined)[] = tasks.map(() => undefined);
    let completed = 0;
    let failed = 0;

    await PromisePool.for(tasks)
      .withConcurrency(this.concurrency)
      .handleError(async (error) => {
        throw error;
      })
      .process(async (task, index) => {
        const { subscription, group } = task;
        const outcome = await this.listAll(`list resources of ${subscription.id}/${group.name}`, (token, s) =>
          this.source.listResourcesPage(subscription.id, group.name, token, s),
        );

        if (outcome.status === "succeeded") {
          const collected: CollectedResource[] = [];
          for (const payload of outcome.value) {
            collected.push({
              subscriptionId: subscription.id,
              resourceGroupId: group.id,
              raw: await this.withDetails(subscription.id, group.name, payload),
            });
          }
          resourcesByTask[index] = collected;
          succeeded[index] = true;
        } else {
          const failure = failureFromOutcome(outcome, "resourceGroup", subscription.id, group.name);
          logger?.warn(`Resource listing failed: ${failure.message}`, {
            subscriptionId: subscription.id,
            resourceGroup: group.name,
          });
          groupFailures[index] = failure;
          failed++;
        }

        completed++;
        this.options.onProgress?.({
          completedGroups: completed,
          totalGroups: tasks.length,
          failedGroups: failed,
          subscriptionId: subscription.id,
          resourceGroup: group.name,
        });
      });

    throwIfCancelled(signal);

    for (const failure of [...subscriptionFailures, ...groupFailures]) {
      if (failure) report.record(failure);
    }

    return {
      subscriptions: subscriptions.map((s) => ({ ...s })),
      resourceGroups: tasks.filter((_, i) => succeeded[i]).map((t) => t.group),
      resources: resourcesByTask.flat(),
      failures: report.list(),
    };
  }

  /**
   * Exhaust a paginated listing, retrying each page on its own.
   */
  private async listAll<T>(
    operation: string,
    fetchPage: (token: string | undefined, signal: AbortSignal) => Promise<Page<T>>,
  ): Promise<RetryOutcome<T[]>> {
    let pages = 0;
    try {
      const items = await collectPages(async (token) => {
        pages++;
        const outcome = await this.run(operation, (s) => fetchPage(token, s));
        if (outcome.status !== "succeeded") throw new ScopeFailure(outcome);
        return outcome.value;
      });
      return { status: "succeeded", value: items, attempts: pages };
    } catch (error) {
      if (error instanceof ScopeFailure) return error.outcome;
      if (error instanceof PaginationCursorError) return { status: "permanent-failure", error, attempts: pages };
      throw error;
    }
  }

  private toResourceGroups(subscription: Subscription, raw: RawResourceGroup[]): ResourceGroup[] {
    const groups: ResourceGroup[] = [];
    for (const rg of raw) {
      if (!rg.name) {
        this.options.logger?.warn("Skipping resource group without a name", { subscriptionId: subscription.id });
        continue;
      }
      groups.push({
        id: rg.id || `/subscriptions/${subscription.id}/resourceGroups/${rg.name}`,
        name: rg.name,
        subscriptionId: subscription.id,
        location: rg.location || UNKNOWN,
        tags: { ...rg.tags },
      });
    }
    return groups;
  }

  /**
   * Replace a listing payload with the full resource for types that declare a
   * detail api version. The listing payload is kept when the fetch fails.
   */
  private async withDetails(
    subscriptionId: string,
    resourceGroup: string,
    payload: Record<string, unknown>,
  ): Promise<RawResource> {
    const type = typeof payload.type === "string" ? payload.type : UNKNOWN;
    const id = payload.id;
    const apiVersion = this.options.detailApiVersion?.(type);
    if (!apiVersion || typeof id !== "string") return { type, payload };

    const outcome = await this.run(`get ${id}`, (s) => this.source.getResourceById(subscriptionId, id, apiVersion, s));
    if (outcome.status === "succeeded") return { type, payload: outcome.value, apiVersion };

    this.options.logger?.warn(`Detail fetch failed for ${id}, keeping listing payload: ${formatErrorMessage(outcome.error)}`, {
      subscriptionId,
      resourceGroup,
    });
    return { type, payload };
  }
}

