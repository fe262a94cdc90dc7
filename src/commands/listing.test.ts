import { describe, it, expect, vi } from "vitest";
import type { RuntimeEnv } from "../runtime.js";
import { FakeAzure, azureError } from "../testing/fake-azure.js";
import { subscriptionsCommand, tenantsCommand } from "./listing.js";
import type { CommandDeps } from "./shared.js";

function captureRuntime() {
  const logs: string[] = [];
  const errors: string[] = [];
  const exits: number[] = [];
  const runtime: RuntimeEnv = {
    log: (message) => logs.push(message),
    error: (message) => errors.push(message),
    exit: (code) => exits.push(code),
  };
  return { runtime, logs, errors, exits };
}

function deps(azure: FakeAzure): CommandDeps {
  return {
    env: {},
    credentials: async () => ({ credential: { getToken: vi.fn(async () => null) }, method: "default" }),
    sources: () => ({ subscriptions: azure, resources: azure }),
    logTransports: [],
  };
}

const azure = () =>
  new FakeAzure([
    { id: "sub-1", displayName: "Production", groups: [] },
    { id: "sub-2", groups: [] },
  ]);

describe("subscriptionsCommand", () => {
  it("prints each subscription with its name", async () => {
    const { runtime, logs, exits } = captureRuntime();

    await subscriptionsCommand({ nonInteractive: true }, runtime, deps(azure()));

    expect(logs).toEqual(["\nSubscriptions:\n", "  sub-1", "    Name: Production", "  sub-2", "    Name: sub-2"]);
    expect(exits).toEqual([0]);
  });

  it("prints JSON with --json", async () => {
    const { runtime, logs } = captureRuntime();

    await subscriptionsCommand({ json: true }, runtime, deps(azure()));

    expect(logs).toEqual([
      JSON.stringify(
        [
          { id: "sub-1", displayName: "Production" },
          { id: "sub-2", displayName: "sub-2" },
        ],
        null,
        2,
      ),
    ]);
  });

  it("reports an empty listing", async () => {
    const { runtime, logs } = captureRuntime();

    await subscriptionsCommand({}, runtime, deps(new FakeAzure([])));

    expect(logs).toEqual(["No subscriptions found"]);
  });
});

describe("tenantsCommand", () => {
  it("prints the tenants", async () => {
    const { runtime, logs, exits } = captureRuntime();

    await tenantsCommand({}, runtime, deps(azure()));

    expect(logs).toEqual(["\nTenants:\n", "  tenant-1", "    Name: Test Tenant"]);
    expect(exits).toEqual([0]);
  });

  it("exits 2 when the credential is rejected", async () => {
    const { runtime, errors, exits } = captureRuntime();
    const failing: CommandDeps = {
      ...deps(azure()),
      credentials: async () => {
        throw azureError(401, "InvalidAuthenticationToken", "token rejected");
      },
    };

    await tenantsCommand({}, runtime, failing);

    expect(exits).toEqual([2]);
    expect(errors).toEqual(["[InvalidAuthenticationToken] (HTTP 401) token rejected"]);
  });
});
