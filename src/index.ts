/**
 * Library entry point. The CLI lives in `cli/main.ts`.
 */

export * from "./types.js";
export * from "./errors.js";
export { EXIT_CODES, exitCodeForError, generateDocumentation } from "./generate.js";
export type { ExitCode, GenerateOptions, GenerateResult } from "./generate.js";
export { configFromEnv, configSchema, getDefaultConfig, loadConfigFile, parseConfig, resolveConfig } from "./config.js";
export type { DocsConfig, ResolvedConfig } from "./config.js";
export { AZURE_RETRY_DEFAULTS, createAzureRetryRunner, formatErrorMessage, runWithRetry, withAzureRetry } from "./retry.js";
export type { RetryOutcome, RetryRunner } from "./retry.js";
export { writeOutputFiles } from "./output/writer.js";
export { VERSION } from "./version.js";

export * from "./collector/index.js";
export * from "./credentials/index.js";
export * from "./logging/index.js";
export * from "./model/index.js";
export * from "./normalizer/index.js";
export * from "./render/index.js";
export * from "./resources/index.js";
export * from "./subscriptions/index.js";
