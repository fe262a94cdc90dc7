/**
 * Configuration: Unit Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { configFromEnv, getDefaultConfig, loadConfigFile, parseConfig, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseConfig", () => {
  it("accepts a valid config", () => {
    const config = parseConfig({ format: "yaml", concurrency: 4, retry: { maxAttempts: 2 } });
    expect(config).toEqual({ format: "yaml", concurrency: 4, retry: { maxAttempts: 2 } });
  });

  it("lists every schema error", () => {
    try {
      parseConfig({ format: "html", concurrency: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const paths = (error instanceof ConfigError ? error.errors : []).map((e) => e.split(":")[0]);
      expect(paths).toContain("/format");
      expect(paths).toContain("/concurrency");
    }
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ outputDir: "x" })).toThrow(ConfigError);
  });
});

describe("configFromEnv", () => {
  it("reads tenant, subscriptions and log level", () => {
    expect(
      configFromEnv({ AZURE_TENANT_ID: "tenant-1", AZURE_SUBSCRIPTION_ID: "sub-1, sub-2,", AZDOCS_LOG_LEVEL: "debug" }),
    ).toEqual({ tenantId: "tenant-1", subscriptions: ["sub-1", "sub-2"], logLevel: "debug" });
  });

  it("rejects an unknown log level", () => {
    expect(() => configFromEnv({ AZDOCS_LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});

describe("resolveConfig", () => {
  it("applies layers in order and merges retry field by field", () => {
    const resolved = resolveConfig({ format: "json", retry: { maxAttempts: 6 } }, { format: "yaml", concurrency: 2 });

    expect(resolved.format).toBe("yaml");
    expect(resolved.concurrency).toBe(2);
    expect(resolved.retry).toEqual({ ...getDefaultConfig().retry, maxAttempts: 6 });
    expect(resolved.output).toBe("./output");
  });
});

describe("loadConfigFile", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("loads and validates a JSON file", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "docs-config-"));
    const file = path.join(dir, "config.json");
    await writeFile(file, JSON.stringify({ output: "./site", logLevel: "warn" }));

    await expect(loadConfigFile(file)).resolves.toEqual({ output: "./site", logLevel: "warn" });
  });

  it("reports malformed JSON as a ConfigError", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "docs-config-"));
    const file = path.join(dir, "config.json");
    await writeFile(file, "{ nope");

    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigError);
  });
});
