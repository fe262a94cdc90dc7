import type { Command } from "commander";

import { subscriptionsCommand, tenantsCommand } from "../../commands/listing.js";
import type { CommandDeps } from "../../commands/shared.js";
import { defaultRuntime, type RuntimeEnv } from "../../runtime.js";
import { commonOptions } from "./options.js";

function withCommonOptions(command: Command): Command {
  return command
    .option("--tenant <id>", "Azure AD tenant ID")
    .option("--non-interactive", "Never open a browser login")
    .option("--config <file>", "JSON config file")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal (default: info)")
    .option("--json", "Output JSON instead of human-friendly text");
}

export function registerListingCommands(program: Command, runtime: RuntimeEnv = defaultRuntime, deps: CommandDeps = {}) {
  withCommonOptions(program.command("subscriptions").description("List the subscriptions the credential can see")).action(
    async (opts: Record<string, unknown>) => {
      await subscriptionsCommand({ ...commonOptions(opts), json: Boolean(opts.json) }, runtime, deps);
    },
  );

  withCommonOptions(program.command("tenants").description("List the tenants the credential can see")).action(
    async (opts: Record<string, unknown>) => {
      await tenantsCommand({ ...commonOptions(opts), json: Boolean(opts.json) }, runtime, deps);
    },
  );
}
