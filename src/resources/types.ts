/**
 * Resource Listing Types
 */

import type { Page } from "../types.js";

export type RawResourceGroup = {
  id?: string;
  name?: string;
  location?: string;
  tags?: Record<string, string>;
};

/**
 * Provider boundary for the two paginated levels below a subscription and the
 * by-id detail fetch. Every method is one remote call.
 */
export interface ResourceSource {
  listResourceGroupsPage(
    subscriptionId: string,
    continuationToken: string | undefined,
    signal: AbortSignal,
  ): Promise<Page<RawResourceGroup>>;

  listResourcesPage(
    subscriptionId: string,
    resourceGroup: string,
    continuationToken: string | undefined,
    signal: AbortSignal,
  ): Promise<Page<Record<string, unknown>>>;

  getResourceById(
    subscriptionId: string,
    resourceId: string,
    apiVersion: string,
    signal: AbortSignal,
  ): Promise<Record<string, unknown>>;
}
