/**
 * Output paths and relative links between rendered nodes.
 */

import path from "node:path";
import type { OutputFormat } from "../types.js";

export const DOCS_DIR = "docs";

export const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
  markdown: "md",
  json: "json",
  yaml: "yaml",
};

/** Output file of a node, relative to the output root. */
export function outputPath(nodePath: string, format: OutputFormat): string {
  return `${DOCS_DIR}/${nodePath}.${FORMAT_EXTENSIONS[format]}`;
}

function encodeSegment(segment: string): string {
  if (segment === "." || segment === "..") return segment;
  return encodeURIComponent(segment).replace(/[()]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Relative link from one node to another, percent-encoded per segment.
 */
export function relativeLink(fromNodePath: string, toNodePath: string, format: OutputFormat): string {
  const from = path.posix.dirname(outputPath(fromNodePath, format));
  const relative = path.posix.relative(from, outputPath(toNodePath, format));
  return relative.split("/").map(encodeSegment).join("/");
}
