/**
 * `subscriptions` and `tenants`: print what the credential can see.
 */

import { exitCodeForError } from "../generate.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { SubscriptionEnumerator } from "../subscriptions/index.js";
import { theme } from "../terminal/theme.js";
import { commonConfigLayer, openSession, reportCommandError, type CommandDeps, type CommonCommandOptions } from "./shared.js";

export type ListingCommandOptions = CommonCommandOptions & {
  json?: boolean;
};

async function openEnumerator(opts: ListingCommandOptions, deps: CommandDeps): Promise<SubscriptionEnumerator> {
  const { config, logger, sources } = await openSession(commonConfigLayer(opts), opts, deps);
  return new SubscriptionEnumerator(sources.subscriptions, {
    retry: config.retry,
    callTimeoutMs: config.callTimeoutMs,
    signal: deps.signal,
    logger,
  });
}

export async function subscriptionsCommand(
  opts: ListingCommandOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<void> {
  try {
    const { subscriptions } = await (await openEnumerator(opts, deps)).enumerate();
    if (opts.json) {
      runtime.log(JSON.stringify(subscriptions, null, 2));
    } else if (subscriptions.length === 0) {
      runtime.log("No subscriptions found");
    } else {
      runtime.log("\nSubscriptions:\n");
      for (const s of subscriptions) {
        runtime.log(`  ${s.id}`);
        runtime.log(`    Name: ${s.displayName}`);
      }
    }
    runtime.exit(0);
  } catch (error) {
    reportCommandError(runtime, error);
    runtime.exit(exitCodeForError(error));
  }
}

export async function tenantsCommand(
  opts: ListingCommandOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<void> {
  try {
    const tenants = await (await openEnumerator(opts, deps)).listTenants();
    if (opts.json) {
      runtime.log(JSON.stringify(tenants, null, 2));
    } else if (tenants.length === 0) {
      runtime.log("No tenants found");
    } else {
      runtime.log("\nTenants:\n");
      for (const t of tenants) {
        runtime.log(`  ${t.tenantId}`);
        runtime.log(`    Name: ${t.displayName}`);
        if (t.defaultDomain) runtime.log(theme.muted(`    Domain: ${t.defaultDomain}`));
      }
    }
    runtime.exit(0);
  } catch (error) {
    reportCommandError(runtime, error);
    runtime.exit(exitCodeForError(error));
  }
}
