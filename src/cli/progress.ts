/**
 * Single-line collection progress on stderr.
 */

import type { CollectionProgress } from "../collector/index.js";

export type ProgressOptions = {
  stream?: { write: (chunk: string) => unknown };
  /** Suppress output entirely. */
  silent?: boolean;
};

export type CollectionProgressLine = {
  update: (event: CollectionProgress) => void;
  /** Leave the last line on screen and end it. Safe to call twice. */
  done: () => void;
};

export function formatCollectionProgress(event: CollectionProgress): string {
  const failed = event.failedGroups > 0 ? `, ${event.failedGroups} failed` : "";
  return `Resource groups ${event.completedGroups}/${event.totalGroups} done${failed}`;
}

export function createCollectionProgress(options?: ProgressOptions): CollectionProgressLine {
  const silent = options?.silent ?? false;
  const stream = options?.stream ?? process.stderr;
  let line = "Listing resource groups";
  // Visible width of the previous line, so a shorter one can blank it out.
  let width = 0;
  let finished = false;

  const write = (end = "") => {
    if (silent) return;
    stream.write(`\r  ${line.padEnd(width)}${end}`);
    width = line.length;
  };

  write();

  return {
    update(event) {
      if (finished) return;
      line = formatCollectionProgress(event);
      write();
    },
    done() {
      if (finished) return;
      finished = true;
      write("\n");
    },
  };
}

/**
 * Run a collection with a progress line that is ended however the run ends.
 */
export async function withCollectionProgress<T>(
  fn: (onProgress: (event: CollectionProgress) => void) => Promise<T>,
  options?: ProgressOptions,
): Promise<T> {
  const progress = createCollectionProgress(options);
  try {
    return await fn(progress.update);
  } finally {
    progress.done();
  }
}
