/**
 * Schema Normalizer: Unit Tests
 */

import { describe, it, expect, beforeAll } from "vitest";
import { HandlerRegistry, loadHandlerRegistry } from "./handlers.js";
import { flattenGeneric, normalizeResource } from "./normalizer.js";
import { UNKNOWN } from "../types.js";

const RG = "/subscriptions/sub-1/resourceGroups/rg-web";

describe("normalizeResource", () => {
  let registry: HandlerRegistry;

  beforeAll(async () => {
    registry = await loadHandlerRegistry();
  });

  it("projects handler fields for a typed resource", () => {
    const record = normalizeResource(
      {
        type: "Microsoft.Compute/virtualMachines",
        apiVersion: "2023-03-01",
        payload: {
          id: `${RG}/providers/Microsoft.Compute/virtualMachines/vm-1`,
          name: "vm-1",
          type: "Microsoft.Compute/virtualMachines",
          location: "westeurope",
          tags: { env: "prod", tier: 2, owner: { team: "x" } },
          properties: {
            hardwareProfile: { vmSize: "Standard_B2s" },
            storageProfile: { osDisk: { osType: "Linux" } },
            networkProfile: { networkInterfaces: [{ id: "/nic-1" }, { id: "/nic-2" }] },
            provisioningState: "Succeeded",
          },
        },
      },
      { resourceGroupId: RG, registry },
    );

    expect(record).toEqual({
      id: `${RG}/providers/Microsoft.Compute/virtualMachines/vm-1`,
      name: "vm-1",
      type: "Microsoft.Compute/virtualMachines",
      resourceGroupId: RG,
      location: "westeurope",
      tags: { env: "prod", tier: "2" },
      properties: {
        vmSize: "Standard_B2s",
        osType: "Linux",
        adminUsername: UNKNOWN,
        provisioningState: "Succeeded",
        networkInterfaces: ["/nic-1", "/nic-2"],
      },
      rawSchemaVersion: "2023-03-01",
      handler: "typed",
    });
  });

  it("matches handler types case-insensitively", () => {
    const record = normalizeResource(
      { type: "microsoft.storage/STORAGEACCOUNTS", payload: { id: "/sa", name: "sa", sku: { name: "Standard_LRS" }, kind: "StorageV2" } },
      { resourceGroupId: RG, registry },
    );

    expect(record.handler).toBe("typed");
    expect(record.properties).toEqual({ sku: "Standard_LRS", kind: "StorageV2", accessTier: UNKNOWN, httpsOnly: UNKNOWN });
    expect(record.rawSchemaVersion).toBe("2023-01-01");
  });

  it("shapes array elements with nested fields", () => {
    const record = normalizeResource(
      {
        type: "Microsoft.Network/virtualNetworks",
        payload: {
          id: "/vnet",
          name: "vnet",
          properties: {
            addressSpace: { addressPrefixes: ["10.0.0.0/16"] },
            subnets: [
              {
                name: "default",
                properties: {
                  addressPrefix: "10.0.0.0/24",
                  networkSecurityGroup: { id: "/nsg" },
                  serviceEndpoints: [{ service: "Microsoft.Storage" }],
                  privateEndpointNetworkPolicies: "Disabled",
                  privateLinkServiceNetworkPolicies: "Enabled",
                },
              },
              { name: "apps", properties: { addressPrefixes: ["10.0.1.0/24"] } },
            ],
          },
        },
      },
      { resourceGroupId: RG, registry },
    );

    expect(record.properties).toEqual({
      addressSpace: ["10.0.0.0/16"],
      subnets: [
        {
          name: "default",
          addressPrefix: "10.0.0.0/24",
          networkSecurityGroup: "/nsg",
          routeTable: UNKNOWN,
          serviceEndpoints: ["Microsoft.Storage"],
          delegations: UNKNOWN,
          privateEndpointNetworkPolicies: "Disabled",
          privateLinkServiceNetworkPolicies: "Enabled",
        },
        {
          name: "apps",
          addressPrefix: ["10.0.1.0/24"],
          networkSecurityGroup: UNKNOWN,
          routeTable: UNKNOWN,
          serviceEndpoints: UNKNOWN,
          delegations: UNKNOWN,
          privateEndpointNetworkPolicies: UNKNOWN,
          privateLinkServiceNetworkPolicies: UNKNOWN,
        },
      ],
    });
  });

  it("marks a missing nested list as unknown", () => {
    const record = normalizeResource(
      { type: "Microsoft.Network/networkInterfaces", payload: { id: "/nic", name: "nic" } },
      { resourceGroupId: RG, registry },
    );
    expect(record.properties).toEqual({ ipConfigurations: UNKNOWN, virtualMachine: UNKNOWN });
  });

  it("keeps every original field of an unregistered type", () => {
    const payload: Record<string, unknown> = {
      id: `${RG}/providers/Contoso.Widgets/gadgets/g-1`,
      name: "g-1",
      type: "Contoso.Widgets/gadgets",
      location: "northeurope",
      kind: "v2",
      sku: { name: "S1", tier: "Standard" },
      properties: { state: "Running", nested: { deep: 1 } },
      emptyObject: {},
      createdAt: new Date("2024-01-02T03:04:05.000Z"),
      missing: undefined,
      apiVersion: "2024-01-01",
    };

    const record = normalizeResource({ type: "Contoso.Widgets/gadgets", payload }, { resourceGroupId: RG, registry });

    expect(record.handler).toBe("generic");
    expect(record.rawSchemaVersion).toBe("2024-01-01");
    expect(record.properties).toEqual({
      id: `${RG}/providers/Contoso.Widgets/gadgets/g-1`,
      name: "g-1",
      type: "Contoso.Widgets/gadgets",
      location: "northeurope",
      kind: "v2",
      "sku.name": "S1",
      "sku.tier": "Standard",
      "properties.state": "Running",
      "properties.nested": { deep: 1 },
      emptyObject: {},
      createdAt: "2024-01-02T03:04:05.000Z",
      missing: UNKNOWN,
      apiVersion: "2024-01-01",
    });
    for (const key of Object.keys(payload)) {
      expect(Object.keys(record.properties).some((k) => k === key || k.startsWith(`${key}.`))).toBe(true);
    }
  });

  it("addresses a payload without an id by its group, type and name", () => {
    const record = normalizeResource(
      { type: "Contoso.Widgets/gadgets", payload: { name: "g-7" } },
      { resourceGroupId: RG, registry },
    );

    expect(record.id).toBe(`${RG}/providers/Contoso.Widgets/gadgets/g-7`);
  });

  it("marks missing common fields as unknown", () => {
    const record = normalizeResource({ type: "Contoso.Widgets/gadgets", payload: {} }, { resourceGroupId: RG, registry });

    expect(record).toEqual({
      id: UNKNOWN,
      name: UNKNOWN,
      type: "Contoso.Widgets/gadgets",
      resourceGroupId: RG,
      location: UNKNOWN,
      tags: {},
      properties: {},
      rawSchemaVersion: UNKNOWN,
      handler: "generic",
    });
  });
});

describe("flattenGeneric", () => {
  it("preserves source key order", () => {
    expect(Object.keys(flattenGeneric({ b: 1, a: { y: 1, x: 2 }, c: [1] }))).toEqual(["b", "a.y", "a.x", "c"]);
  });

  it("keeps a mapping nested when a dotted key would collide with a literal key", () => {
    expect(flattenGeneric({ properties: { a: 1, b: 2 }, "properties.a": "literal", sku: { name: "S1" } })).toEqual({
      properties: { a: 1, b: 2 },
      "properties.a": "literal",
      "sku.name": "S1",
    });
  });
});
