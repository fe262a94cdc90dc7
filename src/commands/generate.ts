/**
 * `generate`: run the pipeline and write the documentation.
 */

import { DOCS_DIR } from "../render/index.js";
import { withCollectionProgress } from "../cli/progress.js";
import { EXIT_CODES, exitCodeForError, generateDocumentation } from "../generate.js";
import { loadHandlerRegistry } from "../normalizer/index.js";
import { writeOutputFiles } from "../output/writer.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";
import { commonConfigLayer, openSession, reportCommandError, type CommandDeps, type CommonCommandOptions } from "./shared.js";

export type GenerateCommandOptions = CommonCommandOptions & {
  output?: string;
  format?: string;
  subscription?: string[];
  concurrency?: number;
  timeout?: number;
  handlers?: string[];
  /** `--no-progress` sets this to false. */
  progress?: boolean;
};

function generateConfigLayer(opts: GenerateCommandOptions): Record<string, unknown> {
  const layer = commonConfigLayer(opts);
  if (opts.output !== undefined) layer.output = opts.output;
  if (opts.format !== undefined) layer.format = opts.format;
  if (opts.subscription !== undefined) layer.subscriptions = opts.subscription;
  if (opts.concurrency !== undefined) layer.concurrency = opts.concurrency;
  if (opts.timeout !== undefined) layer.callTimeoutMs = opts.timeout;
  if (opts.handlers !== undefined) layer.handlers = opts.handlers;
  return layer;
}

export async function generateCommand(
  opts: GenerateCommandOptions = {},
  runtime: RuntimeEnv = defaultRuntime,
  deps: CommandDeps = {},
): Promise<void> {
  try {
    const { config, logger, sources } = await openSession(generateConfigLayer(opts), opts, deps);
    const registry = await loadHandlerRegistry(config.handlers);
    logger.debug(`Loaded ${registry.size} resource handlers`);

    const result = await withCollectionProgress(
      (onProgress) =>
        generateDocumentation({
          subscriptionSource: sources.subscriptions,
          resourceSource: sources.resources,
          registry,
          format: config.format,
          subscriptionIds: config.subscriptions,
          concurrency: config.concurrency,
          retry: config.retry,
          callTimeoutMs: config.callTimeoutMs,
          signal: deps.signal,
          logger,
          onProgress,
          now: deps.now,
        }),
      { silent: opts.progress === false, stream: deps.progressStream },
    );

    await writeOutputFiles(config.output, result.files);
    runtime.log(theme.success(`Wrote ${result.files.length} files to ${config.output}`));
    if (result.exitCode !== EXIT_CODES.success) {
      runtime.log(
        theme.warn(`${result.failures.length} scope(s) could not be collected; see ${DOCS_DIR}/index for details`),
      );
    }
    runtime.exit(result.exitCode);
  } catch (error) {
    reportCommandError(runtime, error);
    runtime.exit(exitCodeForError(error));
  }
}
