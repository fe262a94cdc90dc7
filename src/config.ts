/**
 * Configuration schema (TypeBox), defaults and loading.
 *
 * Precedence, lowest first: defaults, config file, environment, CLI flags.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logging/index.js";

export const configSchema = Type.Object(
  {
    output: Type.Optional(Type.String({ description: "Output directory" })),
    format: Type.Optional(
      Type.Union([Type.Literal("markdown"), Type.Literal("json"), Type.Literal("yaml")], {
        description: "Document format",
      }),
    ),
    tenantId: Type.Optional(Type.String({ description: "Azure AD tenant ID" })),
    subscriptions: Type.Optional(Type.Array(Type.String(), { description: "Explicit subscription IDs" })),
    credentialMethod: Type.Optional(
      Type.Union(
        [
          Type.Literal("default"),
          Type.Literal("cli"),
          Type.Literal("service-principal"),
          Type.Literal("managed-identity"),
          Type.Literal("browser"),
        ],
        { description: "Credential method: default | cli | service-principal | managed-identity | browser" },
      ),
    ),
    concurrency: Type.Optional(Type.Integer({ minimum: 1, maximum: 64, description: "Max in-flight remote calls" })),
    callTimeoutMs: Type.Optional(Type.Integer({ minimum: 1, description: "Timeout per remote call" })),
    retry: Type.Optional(
      Type.Object({
        maxAttempts: Type.Optional(Type.Integer({ minimum: 1 })),
        minDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
        maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
        jitterFactor: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
      }),
    ),
    handlers: Type.Optional(Type.Array(Type.String(), { description: "Extra resource handler files" })),
    logLevel: Type.Optional(
      Type.Union([
        Type.Literal("trace"),
        Type.Literal("debug"),
        Type.Literal("info"),
        Type.Literal("warn"),
        Type.Literal("error"),
        Type.Literal("fatal"),
      ]),
    ),
  },
  { additionalProperties: false },
);

export type DocsConfig = Static<typeof configSchema>;

export type ResolvedConfig = Required<
  Pick<DocsConfig, "output" | "format" | "credentialMethod" | "concurrency" | "callTimeoutMs" | "retry" | "handlers">
> & {
  tenantId?: string;
  subscriptions?: string[];
  logLevel: LogLevel;
};

export function getDefaultConfig(): ResolvedConfig {
  return {
    output: "./output",
    format: "markdown",
    credentialMethod: "default",
    concurrency: 8,
    callTimeoutMs: 60_000,
    retry: { maxAttempts: 4, minDelayMs: 200, maxDelayMs: 30_000, jitterFactor: 0.2 },
    handlers: [],
    logLevel: "info",
  };
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(input: unknown, source = "config"): DocsConfig {
  if (Value.Check(configSchema, input)) return input;

  const errors = [...Value.Errors(configSchema, input)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  throw new ConfigError(`Invalid ${source}`, errors);
}

export async function loadConfigFile(filePath: string): Promise<DocsConfig> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(parsed, `config file ${filePath}`);
}

/**
 * Values taken from the environment, mirroring the Azure SDK variable names.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DocsConfig {
  const config: DocsConfig = {};
  if (env.AZURE_TENANT_ID) config.tenantId = env.AZURE_TENANT_ID;
  if (env.AZURE_SUBSCRIPTION_ID) {
    config.subscriptions = env.AZURE_SUBSCRIPTION_ID.split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0);
  }
  if (env.AZDOCS_LOG_LEVEL) config.logLevel = parseConfig({ logLevel: env.AZDOCS_LOG_LEVEL }, "AZDOCS_LOG_LEVEL").logLevel;
  return config;
}

/**
 * Merge layers in order; later layers win. `retry` merges field by field.
 */
export function resolveConfig(...layers: DocsConfig[]): ResolvedConfig {
  const resolved = getDefaultConfig();
  for (const layer of layers) {
    if (layer.output !== undefined) resolved.output = layer.output;
    if (layer.format !== undefined) resolved.format = layer.format;
    if (layer.tenantId !== undefined) resolved.tenantId = layer.tenantId;
    if (layer.subscriptions !== undefined) resolved.subscriptions = layer.subscriptions;
    if (layer.credentialMethod !== undefined) resolved.credentialMethod = layer.credentialMethod;
    if (layer.concurrency !== undefined) resolved.concurrency = layer.concurrency;
    if (layer.callTimeoutMs !== undefined) resolved.callTimeoutMs = layer.callTimeoutMs;
    if (layer.handlers !== undefined) resolved.handlers = layer.handlers;
    if (layer.logLevel !== undefined) resolved.logLevel = layer.logLevel;
    if (layer.retry !== undefined) resolved.retry = { ...resolved.retry, ...layer.retry };
  }
  return resolved;
}
