/**
 * Azure Resource Source
 *
 * Page-level access to resource groups and resources via @azure/arm-resources.
 */

import type { CredentialContext } from "../credentials/index.js";
import { readPage } from "../pagination.js";
import type { Page } from "../types.js";
import type { RawResourceGroup, ResourceSource } from "./types.js";

type ArmResources = typeof import("@azure/arm-resources");
type ResourceManagementClient = InstanceType<ArmResources["ResourceManagementClient"]>;

/** Copy an SDK model into a plain payload record. */
export function toPayload(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

export class AzureResourceSource implements ResourceSource {
  private sdk: Promise<ArmResources> | null = null;
  private clients = new Map<string, ResourceManagementClient>();

  constructor(private readonly context: CredentialContext) {}

  private loadSdk(): Promise<ArmResources> {
    this.sdk ??= import("@azure/arm-resources");
    return this.sdk;
  }

  private async getClient(subscriptionId: string): Promise<ResourceManagementClient> {
    const { ResourceManagementClient } = await this.loadSdk();
    let client = this.clients.get(subscriptionId);
    if (!client) {
      client = new ResourceManagementClient(this.context.credential, subscriptionId);
      this.clients.set(subscriptionId, client);
    }
    return client;
  }

  async listResourceGroupsPage(
    subscriptionId: string,
    continuationToken: string | undefined,
    signal: AbortSignal,
  ): Promise<Page<RawResourceGroup>> {
    const { getContinuationToken } = await this.loadSdk();
    const client = await this.getClient(subscriptionId);
    const pages = client.resourceGroups.list({ abortSignal: signal }).byPage({ continuationToken });
    const page = await readPage(pages, getContinuationToken);
    return {
      items: page.items.map((rg) => ({ id: rg.id, name: rg.name, location: rg.location, tags: rg.tags })),
      continuationToken: page.continuationToken,
    };
  }

  async listResourcesPage(
    subscriptionId: string,
    resourceGroup: string,
    continuationToken: string | undefined,
    signal: AbortSignal,
  ): Promise<Page<Record<string, unknown>>> {
    const { getContinuationToken } = await this.loadSdk();
    const client = await this.getClient(subscriptionId);
    const pages = client.resources
      .listByResourceGroup(resourceGroup, { abortSignal: signal })
      .byPage({ continuationToken });
    const page = await readPage(pages, getContinuationToken);
    return { items: page.items.map(toPayload), continuationToken: page.continuationToken };
  }

  async getResourceById(
    subscriptionId: string,
    resourceId: string,
    apiVersion: string,
    signal: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const client = await this.getClient(subscriptionId);
    return toPayload(await client.resources.getById(resourceId, apiVersion, { abortSignal: signal }));
  }
}

