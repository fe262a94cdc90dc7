#!/usr/bin/env node
import { EXIT_CODES } from "../generate.js";
import { buildProgram } from "./program/build-program.js";

const controller = new AbortController();

process.on("SIGINT", () => {
  if (controller.signal.aborted) process.exit(EXIT_CODES.cancelled);
  process.stderr.write("\nCancelling; press Ctrl+C again to exit immediately\n");
  controller.abort();
});

buildProgram({ signal: controller.signal })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = EXIT_CODES.fatal;
  });
