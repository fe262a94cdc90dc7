/**
 * In-process stand-in for the Azure subscription and resource providers,
 * used by collector and orchestration tests.
 */

import type { RawResourceGroup, ResourceSource } from "../resources/index.js";
import type { RawSubscription, RawTenant, SubscriptionSource } from "../subscriptions/index.js";
import type { Page } from "../types.js";

export type FakeGroup = {
  name: string;
  location?: string;
  tags?: Record<string, string>;
  resources: Record<string, unknown>[];
  /** Errors thrown by successive resource page calls before they succeed. */
  errors?: unknown[];
  /** Milliseconds every resource page call of this group takes. */
  delayMs?: number;
};

export type FakeSubscription = {
  id: string;
  displayName?: string;
  groups: FakeGroup[];
  /** Errors thrown by successive resource group page calls. */
  errors?: unknown[];
};

export type FakeAzureOptions = {
  pageSize?: number;
  /** Full payloads returned by the by-id fetch; a missing id throws 404. */
  details?: Record<string, Record<string, unknown>>;
  /** Delay every call by one timer tick so calls overlap. */
  tick?: boolean;
};

export function azureError(statusCode: number, code: string, message = code): Record<string, unknown> {
  return { statusCode, code, message };
}

export class FakeAzure implements ResourceSource, SubscriptionSource {
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private readonly pageSize: number;

  constructor(
    private readonly subscriptions: FakeSubscription[],
    private readonly options: FakeAzureOptions = {},
  ) {
    this.pageSize = Math.max(1, options.pageSize ?? 2);
  }

  private async enter<T>(call: string, fn: () => T, delayMs = 0): Promise<T> {
    this.calls.push(call);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const wait = Math.max(delayMs, this.options.tick ? 1 : 0);
      if (wait > 0) await new Promise((resolve) => setTimeout(resolve, wait));
      return fn();
    } finally {
      this.inFlight--;
    }
  }

  private page<T>(items: T[], token: string | undefined): Page<T> {
    const start = token ? Number(token.replace("page-", "")) : 0;
    const end = start + this.pageSize;
    return {
      items: items.slice(start, end),
      continuationToken: end < items.length ? `page-${end}` : undefined,
    };
  }

  private subscription(id: string): FakeSubscription {
    const found = this.subscriptions.find((s) => s.id === id);
    if (!found) throw azureError(404, "SubscriptionNotFound", `Subscription ${id} not found`);
    return found;
  }

  async *listSubscriptions(): AsyncIterable<RawSubscription> {
    this.calls.push("listSubscriptions");
    for (const s of this.subscriptions) yield { subscriptionId: s.id, displayName: s.displayName };
  }

  getSubscription(subscriptionId: string): Promise<RawSubscription> {
    return this.enter(`getSubscription ${subscriptionId}`, () => {
      const s = this.subscription(subscriptionId);
      return { subscriptionId: s.id, displayName: s.displayName };
    });
  }

  async *listTenants(): AsyncIterable<RawTenant> {
    yield { tenantId: "tenant-1", displayName: "Test Tenant" };
  }

  listResourceGroupsPage(subscriptionId: string, continuationToken: string | undefined): Promise<Page<RawResourceGroup>> {
    return this.enter(`listResourceGroups ${subscriptionId} ${continuationToken ?? "-"}`, () => {
      const s = this.subscription(subscriptionId);
      const error = s.errors?.shift();
      if (error !== undefined) throw error;
      const groups = s.groups.map((g) => ({
        id: `/subscriptions/${s.id}/resourceGroups/${g.name}`,
        name: g.name,
        location: g.location ?? "westeurope",
        tags: g.tags,
      }));
      return this.page(groups, continuationToken);
    });
  }

  listResourcesPage(
    subscriptionId: string,
    resourceGroup: string,
    continuationToken: string | undefined,
  ): Promise<Page<Record<string, unknown>>> {
    const group = this.subscriptions
      .find((s) => s.id === subscriptionId)
      ?.groups.find((g) => g.name === resourceGroup);
    return this.enter(
      `listResources ${subscriptionId}/${resourceGroup} ${continuationToken ?? "-"}`,
      () => {
        this.subscription(subscriptionId);
        if (!group) throw azureError(404, "ResourceGroupNotFound", `Resource group ${resourceGroup} not found`);
        const error = group.errors?.shift();
        if (error !== undefined) throw error;
        return this.page(group.resources, continuationToken);
      },
      group?.delayMs,
    );
  }

  getResourceById(_subscriptionId: string, resourceId: string, apiVersion: string): Promise<Record<string, unknown>> {
    return this.enter(`getById ${resourceId} ${apiVersion}`, () => {
      const detail = this.options.details?.[resourceId];
      if (!detail) throw azureError(404, "ResourceNotFound", `Resource ${resourceId} not found`);
      return { ...detail };
    });
  }
}
