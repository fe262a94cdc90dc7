import type { Command } from "commander";

import { generateCommand } from "../../commands/generate.js";
import type { CommandDeps } from "../../commands/shared.js";
import { defaultRuntime, type RuntimeEnv } from "../../runtime.js";
import { theme } from "../../terminal/theme.js";
import { commonOptions, numberOption, parseIntegerOption, stringListOption, stringOption } from "./options.js";

export function registerGenerateCommand(program: Command, runtime: RuntimeEnv = defaultRuntime, deps: CommandDeps = {}) {
  program
    .command("generate", { isDefault: true })
    .description("Document every resource group and resource the credential can see")
    .addHelpText(
      "after",
      () => `\n${theme.muted("Exit codes:")} 0 complete, 1 partial, 2 failed, 130 cancelled\n`,
    )
    .option("--output <dir>", "Output directory (default: ./output)")
    .option("--format <format>", "Document format: markdown | json | yaml (default: markdown)")
    .option("--non-interactive", "Never open a browser login")
    .option("--subscription <id...>", "Only document these subscriptions")
    .option("--tenant <id>", "Azure AD tenant ID")
    .option("--concurrency <n>", "Max remote calls in flight (default: 8)", parseIntegerOption)
    .option("--timeout <ms>", "Timeout per remote call in milliseconds (default: 60000)", parseIntegerOption)
    .option("--handlers <file...>", "Extra resource handler files")
    .option("--config <file>", "JSON config file")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal (default: info)")
    .option("--no-progress", "Do not draw progress on stderr")
    .action(async (opts: Record<string, unknown>) => {
      await generateCommand(
        {
          ...commonOptions(opts),
          output: stringOption(opts.output),
          format: stringOption(opts.format),
          subscription: stringListOption(opts.subscription),
          concurrency: numberOption(opts.concurrency),
          timeout: numberOption(opts.timeout),
          handlers: stringListOption(opts.handlers),
          progress: opts.progress !== false,
        },
        runtime,
        deps,
      );
    });
}
