/**
 * Snapshot fixture shared by builder, renderer and export tests.
 */

import { UNKNOWN, type ResourceRecord, type Snapshot } from "../types.js";

const SUB1 = "sub-1";
const SUB2 = "sub-2";

export const RG_WEB = `/subscriptions/${SUB1}/resourceGroups/rg-web`;
export const RG_DATA = `/subscriptions/${SUB1}/resourceGroups/rg-data`;
export const RG_TEST = `/subscriptions/${SUB2}/resourceGroups/rg-test`;

function record(
  resourceGroupId: string,
  name: string,
  type: string,
  properties: ResourceRecord["properties"],
  handler: ResourceRecord["handler"] = "typed",
): ResourceRecord {
  return {
    id: `${resourceGroupId}/providers/${type}/${name}`,
    name,
    type,
    resourceGroupId,
    location: "westeurope",
    tags: {},
    properties,
    rawSchemaVersion: handler === "typed" ? "2023-03-01" : UNKNOWN,
    handler,
  };
}

export function sampleSnapshot(): Snapshot {
  return {
    subscriptions: [
      { id: SUB2, displayName: "Staging" },
      { id: SUB1, displayName: "Production" },
    ],
    resourceGroups: [
      { id: RG_WEB, name: "rg-web", subscriptionId: SUB1, location: "westeurope", tags: { env: "prod" } },
      { id: RG_DATA, name: "rg-data", subscriptionId: SUB1, location: "northeurope", tags: {} },
      { id: RG_TEST, name: "rg-test", subscriptionId: SUB2, location: "westeurope", tags: {} },
    ],
    resources: [
      record(RG_WEB, "vm-1", "Microsoft.Compute/virtualMachines", {
        vmSize: "Standard_B2s",
        adminUsername: UNKNOWN,
        networkInterfaces: ["/nic-1"],
      }),
      record(RG_WEB, "site-b", "Microsoft.Web/sites", { state: "Running", kind: "app" }),
      record(RG_WEB, "site-a", "microsoft.web/Sites", { state: "Stopped", kind: "app" }),
      record(
        RG_DATA,
        "gadget|1",
        "Contoso.Widgets/gadgets",
        { "sku.name": "S1", "properties.nested": { deep: { value: 1 } }, "properties.list": [1, 2], enabled: true, note: null },
        "generic",
      ),
      record(RG_TEST, "sttest", "Microsoft.Storage/storageAccounts", { sku: "Standard_LRS", httpsOnly: true }),
    ],
    failures: [
      {
        scope: "resourceGroup",
        subscriptionId: SUB1,
        resourceGroup: "rg-locked",
        reason: "permanent",
        code: "AuthorizationFailed",
        statusCode: 403,
        message: "[AuthorizationFailed] (HTTP 403) denied",
        attempts: 1,
      },
    ],
  };
}
