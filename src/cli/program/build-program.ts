import { Command } from "commander";

import type { CommandDeps } from "../../commands/shared.js";
import { defaultRuntime, type RuntimeEnv } from "../../runtime.js";
import { VERSION } from "../../version.js";
import { registerGenerateCommand } from "./register.generate.js";
import { registerListingCommands } from "./register.listing.js";

export function buildProgram(deps: CommandDeps = {}, runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name("azure-resource-docs")
    .description("Generate documentation for the resources in Azure subscriptions")
    .version(VERSION);

  registerGenerateCommand(program, runtime, deps);
  registerListingCommands(program, runtime, deps);
  return program;
}
