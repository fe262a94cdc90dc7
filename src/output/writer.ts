/**
 * Output Writer
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { RenderedFile } from "../render/index.js";

/**
 * Write every rendered file under `outputDir`, creating directories as
 * needed. Returns the absolute paths written, in input order.
 */
export async function writeOutputFiles(outputDir: string, files: RenderedFile[]): Promise<string[]> {
  const root = path.resolve(outputDir);
  const written: string[] = [];
  for (const file of files) {
    const target = path.resolve(root, file.path);
    if (path.relative(root, target).startsWith("..")) {
      throw new Error(`Refusing to write outside the output directory: ${file.path}`);
    }
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, file.content, "utf8");
    written.push(target);
  }
  return written;
}
