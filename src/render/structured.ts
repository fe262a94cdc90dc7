/**
 * JSON and YAML renderers. Both serialize the same document object.
 */

import YAML from "yaml";
import type { DocumentNode, NodeContent, NodeKind } from "../model/index.js";
import { outputPath } from "./links.js";

export type StructuredDocument = {
  path: string;
  title: string;
  kind: NodeKind;
  links: Array<{ title: string; path: string }>;
  content: NodeContent;
};

/** Links point at the rendered files, relative to the output root. */
export function toStructuredDocument(node: DocumentNode, format: "json" | "yaml"): StructuredDocument {
  return {
    path: outputPath(node.path, format),
    title: node.title,
    kind: node.kind,
    links: node.links.map((l) => ({ title: l.title, path: outputPath(l.path, format) })),
    content: node.content,
  };
}

export function renderJson(node: DocumentNode): string {
  return `${JSON.stringify(toStructuredDocument(node, "json"), null, 2)}\n`;
}

export function renderYaml(node: DocumentNode): string {
  return YAML.stringify(toStructuredDocument(node, "yaml"), { aliasDuplicateObjects: false });
}
