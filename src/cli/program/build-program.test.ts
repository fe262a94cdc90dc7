import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InvalidArgumentError } from "commander";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { CommandDeps } from "../../commands/shared.js";
import type { CredentialContextOptions } from "../../credentials/index.js";
import type { RuntimeEnv } from "../../runtime.js";
import { FakeAzure } from "../../testing/fake-azure.js";
import { buildProgram } from "./build-program.js";
import { parseIntegerOption } from "./options.js";

function setup() {
  const logs: string[] = [];
  const exits: number[] = [];
  const credentialOptions: CredentialContextOptions[] = [];
  const runtime: RuntimeEnv = {
    log: (message) => logs.push(message),
    error: (message) => logs.push(message),
    exit: (code) => exits.push(code),
  };
  const azure = new FakeAzure([
    {
      id: "sub-1",
      displayName: "Production",
      groups: [{ name: "rg-a", resources: [] }],
    },
  ]);
  const deps: CommandDeps = {
    env: {},
    credentials: async (options) => {
      credentialOptions.push(options);
      return { credential: { getToken: vi.fn(async () => null) }, method: "default" };
    },
    sources: () => ({ subscriptions: azure, resources: azure }),
    logTransports: [],
  };
  return { program: buildProgram(deps, runtime), logs, exits, credentialOptions, azure };
}

describe("buildProgram", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "azdocs-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs generate when no command is named", async () => {
    const { program, exits } = setup();

    await program.parseAsync(["--output", dir, "--no-progress", "--format", "yaml"], { from: "user" });

    expect(exits).toEqual([0]);
    expect(await readdir(path.join(dir, "docs"))).toContain("index.yaml");
  });

  it("passes tenant and interactivity to the credential", async () => {
    const { program, credentialOptions } = setup();

    await program.parseAsync(["subscriptions", "--tenant", "tenant-9", "--non-interactive"], { from: "user" });

    expect(credentialOptions).toHaveLength(1);
    expect(credentialOptions[0]?.tenantId).toBe("tenant-9");
    expect(credentialOptions[0]?.interactive).toBe(false);
  });

  it("limits generate to the named subscriptions", async () => {
    const { program, azure } = setup();

    await program.parseAsync(["generate", "--output", dir, "--no-progress", "--subscription", "sub-1"], {
      from: "user",
    });

    expect(azure.calls).toContain("getSubscription sub-1");
    expect(azure.calls).not.toContain("listSubscriptions");
  });

  it("registers the listing commands", () => {
    const { program } = setup();
    expect(program.commands.map((c) => c.name())).toEqual(["generate", "subscriptions", "tenants"]);
  });
});

describe("parseIntegerOption", () => {
  it("parses whole numbers", () => {
    expect(parseIntegerOption("12")).toBe(12);
  });

  it("rejects anything else", () => {
    expect(() => parseIntegerOption("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseIntegerOption("ten")).toThrow(InvalidArgumentError);
  });
});
