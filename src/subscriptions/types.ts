/**
 * Subscription Types
 */

import type { CollectionFailure, Subscription } from "../types.js";

export type RawSubscription = {
  subscriptionId?: string;
  displayName?: string;
  state?: string;
  tenantId?: string;
};

export type TenantInfo = {
  tenantId: string;
  displayName: string;
  defaultDomain?: string;
};

export type RawTenant = {
  tenantId?: string;
  displayName?: string;
  defaultDomain?: string;
};

/**
 * Provider boundary for subscription and tenant listings. Listings are
 * short, so each one is retried as a whole.
 */
export interface SubscriptionSource {
  listSubscriptions(signal: AbortSignal): AsyncIterable<RawSubscription>;
  getSubscription(subscriptionId: string, signal: AbortSignal): Promise<RawSubscription>;
  listTenants(signal: AbortSignal): AsyncIterable<RawTenant>;
}

export type EnumerationResult = {
  subscriptions: Subscription[];
  /** Explicit subscriptions that could not be looked up. */
  failures: CollectionFailure[];
};
