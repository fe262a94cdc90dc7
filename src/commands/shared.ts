/**
 * Setup shared by every command: configuration layers, logger and the
 * credential context.
 */

import { configFromEnv, loadConfigFile, parseConfig, resolveConfig, type ResolvedConfig } from "../config.js";
import { createCredentialContext, type CredentialContext, type CredentialContextOptions } from "../credentials/index.js";
import { ConfigError, InvariantViolationError } from "../errors.js";
import { ConsoleTransport, createDefaultFormatter, createLogger, type LogTransport, type Logger } from "../logging/index.js";
import { AzureResourceSource, type ResourceSource } from "../resources/index.js";
import { formatErrorMessage } from "../retry.js";
import type { RuntimeEnv } from "../runtime.js";
import { AzureSubscriptionSource, type SubscriptionSource } from "../subscriptions/index.js";
import { theme } from "../terminal/theme.js";

export type CommonCommandOptions = {
  tenant?: string;
  nonInteractive?: boolean;
  config?: string;
  logLevel?: string;
};

export type ProviderSources = {
  subscriptions: SubscriptionSource;
  resources: ResourceSource;
};

/** Collaborators a command reaches outside the process; tests replace them. */
export type CommandDeps = {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  credentials?: (options: CredentialContextOptions) => Promise<CredentialContext>;
  sources?: (context: CredentialContext) => ProviderSources;
  logTransports?: LogTransport[];
  progressStream?: { write: (chunk: string) => unknown };
  now?: () => Date;
};

export type CommandSession = {
  config: ResolvedConfig;
  logger: Logger;
  context: CredentialContext;
  sources: ProviderSources;
};

/**
 * Resolve configuration (defaults < file < environment < flags), then build the
 * logger and credential context.
 */
export async function openSession(
  cliLayer: Record<string, unknown>,
  options: CommonCommandOptions,
  deps: CommandDeps,
): Promise<CommandSession> {
  const env = deps.env ?? process.env;
  const fileLayer = options.config ? await loadConfigFile(options.config) : {};
  const config = resolveConfig(fileLayer, configFromEnv(env), parseConfig(cliLayer, "command line options"));

  const logger = createLogger("azure-resource-docs", {
    level: config.logLevel,
    transports: deps.logTransports ?? [new ConsoleTransport({ formatter: createDefaultFormatter() })],
  });

  const context = await (deps.credentials ?? createCredentialContext)({
    interactive: !options.nonInteractive,
    method: config.credentialMethod,
    tenantId: config.tenantId,
    env,
    logger: logger.child("credentials"),
  });

  const sources = (deps.sources ?? defaultSources)(context);
  return { config, logger, context, sources };
}

function defaultSources(context: CredentialContext): ProviderSources {
  return { subscriptions: new AzureSubscriptionSource(context), resources: new AzureResourceSource(context) };
}

/**
 * Common flags as an unvalidated config layer; only flags that were given are
 * set. `openSession` validates it.
 */
export function commonConfigLayer(options: CommonCommandOptions): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  if (options.tenant !== undefined) layer.tenantId = options.tenant;
  if (options.logLevel !== undefined) layer.logLevel = options.logLevel;
  return layer;
}

/**
 * Print an error that ended a command, with the details its type carries.
 */
export function reportCommandError(runtime: RuntimeEnv, error: unknown): void {
  runtime.error(theme.error(error instanceof Error ? error.message : formatErrorMessage(error)));
  const details =
    error instanceof InvariantViolationError ? error.violations : error instanceof ConfigError ? error.errors : [];
  for (const detail of details) runtime.error(`  - ${detail}`);
}
