/**
 * Documentation Run
 *
 * enumerate → collect → normalize → build → render. Produces the files to
 * write and the exit code; writes nothing itself.
 */

import { ResourceCollector, type CollectionProgress } from "./collector/index.js";
import { RunCancelledError } from "./errors.js";
import { createSilentLogger, type Logger } from "./logging/index.js";
import { buildDocumentTree, compareFailures } from "./model/index.js";
import { normalizeResource, toPropertyValue, type HandlerRegistry } from "./normalizer/index.js";
import { renderDataExport, renderTree, type RawPayloadEntry, type RenderedFile } from "./render/index.js";
import type { ResourceSource } from "./resources/index.js";
import { throwIfCancelled } from "./retry.js";
import { SubscriptionEnumerator, type SubscriptionSource } from "./subscriptions/index.js";
import { UNKNOWN, type CollectionFailure, type OutputFormat, type RetryOptions, type Snapshot } from "./types.js";

export const EXIT_CODES = {
  success: 0,
  partial: 1,
  fatal: 2,
  cancelled: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type GenerateOptions = {
  subscriptionSource: SubscriptionSource;
  resourceSource: ResourceSource;
  registry: HandlerRegistry;
  format: OutputFormat;
  /** Explicit subscriptions; every accessible subscription when empty. */
  subscriptionIds?: string[];
  concurrency?: number;
  retry?: RetryOptions;
  callTimeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: (event: CollectionProgress) => void;
  /** Clock for the data export file name. */
  now?: () => Date;
};

export type GenerateResult = {
  files: RenderedFile[];
  snapshot: Snapshot;
  failures: CollectionFailure[];
  exitCode: ExitCode;
};

/**
 * Run the pipeline once.
 *
 * @throws RunCancelledError when the signal fires; InvariantViolationError when
 *         the snapshot breaks a structural rule. No files are produced in
 *         either case.
 */
export async function generateDocumentation(options: GenerateOptions): Promise<GenerateResult> {
  const logger = options.logger ?? createSilentLogger();
  const { signal } = options;
  const shared = { retry: options.retry, callTimeoutMs: options.callTimeoutMs, signal };

  const enumeration = await new SubscriptionEnumerator(options.subscriptionSource, {
    ...shared,
    logger: logger.child("subscriptions"),
  }).enumerate(options.subscriptionIds);
  logger.info(`Documenting ${enumeration.subscriptions.length} subscription(s)`);

  const collected = await new ResourceCollector(options.resourceSource, {
    ...shared,
    concurrency: options.concurrency,
    logger: logger.child("collector"),
    detailApiVersion: (type) => options.registry.apiVersion(type),
    onProgress: options.onProgress,
  }).collect(enumeration.subscriptions);

  const resources = collected.resources.map(({ resourceGroupId, raw }) =>
    normalizeResource(raw, { resourceGroupId, registry: options.registry }),
  );
  const rawPayloads: RawPayloadEntry[] = collected.resources.map(({ raw }) => {
    const entry: RawPayloadEntry = {
      id: typeof raw.payload.id === "string" ? raw.payload.id : UNKNOWN,
      type: raw.type,
      payload: toPropertyValue(raw.payload),
    };
    if (raw.apiVersion !== undefined) entry.apiVersion = raw.apiVersion;
    return entry;
  });

  const failures = [...enumeration.failures, ...collected.failures].sort(compareFailures);
  const snapshot: Snapshot = {
    subscriptions: collected.subscriptions,
    resourceGroups: collected.resourceGroups,
    resources,
    failures,
  };

  const tree = buildDocumentTree(snapshot);
  throwIfCancelled(signal);

  const timestamp = (options.now ?? (() => new Date()))();
  const files = [...renderTree(tree, options.format), renderDataExport(snapshot, rawPayloads, timestamp)];
  const exitCode = failures.length > 0 ? EXIT_CODES.partial : EXIT_CODES.success;

  logger.info("Run complete", {
    subscriptions: snapshot.subscriptions.length,
    resourceGroups: snapshot.resourceGroups.length,
    resources: snapshot.resources.length,
    failures: failures.length,
    files: files.length,
  });

  return { files, snapshot, failures, exitCode };
}

/**
 * Exit code for an error that ended a run. Everything but cancellation is
 * fatal: invariant violations, authentication and configuration errors.
 */
export function exitCodeForError(error: unknown): ExitCode {
  return error instanceof RunCancelledError ? EXIT_CODES.cancelled : EXIT_CODES.fatal;
}
