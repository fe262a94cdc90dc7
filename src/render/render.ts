/**
 * Tree rendering. Pure: returns file contents, performs no I/O.
 */

import { flattenTree, type DocumentNode } from "../model/index.js";
import type { OutputFormat } from "../types.js";
import { outputPath } from "./links.js";
import { renderMarkdown } from "./markdown.js";
import { renderJson, renderYaml } from "./structured.js";

export type RenderedFile = {
  /** Relative to the output root. */
  path: string;
  content: string;
};

const RENDERERS: Record<OutputFormat, (node: DocumentNode) => string> = {
  markdown: renderMarkdown,
  json: renderJson,
  yaml: renderYaml,
};

/**
 * Render every node of the tree, in pre-order.
 */
export function renderTree(tree: DocumentNode, format: OutputFormat): RenderedFile[] {
  const render = RENDERERS[format];
  return flattenTree(tree).map((node) => ({ path: outputPath(node.path, format), content: render(node) }));
}
