/**
 * Renderers: Unit Tests
 */

import { describe, it, expect } from "vitest";
import path from "node:path";
import YAML from "yaml";
import { buildDocumentTree, flattenTree, type DocumentNode } from "../model/index.js";
import { sampleSnapshot } from "../testing/snapshot.js";
import { escapeMarkdown, renderMarkdown } from "./markdown.js";
import { relativeLink } from "./links.js";
import { renderTree } from "./render.js";
import { renderJson, renderYaml, toStructuredDocument } from "./structured.js";

function nodeAt(path: string): DocumentNode {
  const node = flattenTree(buildDocumentTree(sampleSnapshot())).find((n) => n.path === path);
  if (!node) throw new Error(`No node at ${path}`);
  return node;
}

describe("renderTree", () => {
  it("renders every node with the format's extension", () => {
    const files = renderTree(buildDocumentTree(sampleSnapshot()), "yaml");

    expect(files).toHaveLength(11);
    expect(files[0].path).toBe("docs/index.yaml");
    expect(files[files.length - 1].path).toBe("docs/resource-types.yaml");
  });

  it("is byte-stable across runs", () => {
    for (const format of ["markdown", "json", "yaml"] as const) {
      const first = renderTree(buildDocumentTree(sampleSnapshot()), format);
      const second = renderTree(buildDocumentTree(sampleSnapshot()), format);
      expect(second).toEqual(first);
    }
  });

  it("produces Markdown links that all resolve to rendered files", () => {
    const files = renderTree(buildDocumentTree(sampleSnapshot()), "markdown");
    const rendered = new Set(files.map((f) => f.path));
    let count = 0;

    for (const file of files) {
      for (const match of file.content.matchAll(/\]\(([^)\s]+)\)/g)) {
        const target = path.posix.normalize(path.posix.join(path.posix.dirname(file.path), decodeURIComponent(match[1])));
        expect(rendered.has(target), `${file.path} → ${match[1]}`).toBe(true);
        count++;
      }
    }
    expect(count).toBeGreaterThan(10);
  });
});

describe("renderMarkdown", () => {
  it("renders a resource group overview", () => {
    expect(renderMarkdown(nodeAt("sub-1/rg-web/overview"))).toBe(
      [
        "# Resource Group: rg-web",
        "",
        "[Production](../overview.md)",
        "",
        "- **ID:** /subscriptions/sub-1/resourceGroups/rg-web",
        "- **Location:** westeurope",
        "- **Tags:** env=prod",
        "",
        "## Resource Types",
        "",
        "| Type | Count |",
        "| --- | --- |",
        "| [Microsoft.Compute/virtualMachines](microsoft.compute-virtualmachines.md) | 1 |",
        "| [Microsoft.Web/sites](microsoft.web-sites.md) | 2 |",
        "",
      ].join("\n"),
    );
  });

  it("renders nested properties as indented lists and prints unknown verbatim", () => {
    expect(renderMarkdown(nodeAt("sub-1/rg-data/contoso.widgets-gadgets"))).toBe(
      [
        "# Contoso.Widgets/gadgets in rg-data",
        "",
        "[rg-data](overview.md)",
        "",
        "## gadget\\|1",
        "",
        "- **ID:** /subscriptions/sub-1/resourceGroups/rg-data/providers/Contoso.Widgets/gadgets/gadget\\|1",
        "- **Location:** westeurope",
        "- **Schema version:** (unknown)",
        "- **Handler:** generic",
        "- **Tags:** none",
        "",
        "### Properties",
        "",
        "- **sku.name:** S1",
        "- **properties.nested:**",
        "  - **deep:**",
        "    - **value:** 1",
        "- **properties.list:**",
        "  - 1",
        "  - 2",
        "- **enabled:** true",
        "- **note:** null",
        "",
      ].join("\n"),
    );
  });

  it("lists failures on the index", () => {
    const markdown = renderMarkdown(nodeAt("index"));

    expect(markdown).toContain(
      "| resourceGroup | sub-1 | rg-locked | permanent | 1 | \\[AuthorizationFailed\\] (HTTP 403) denied |",
    );
    expect(markdown).toContain("| [Production](sub-1/overview.md) | sub-1 | 2 | 4 | 1 |");
  });
});

describe("escapeMarkdown", () => {
  it("escapes syntax characters and folds newlines", () => {
    expect(escapeMarkdown("a_b*c|d\n[e]")).toBe("a\\_b\\*c\\|d \\[e\\]");
  });
});

describe("relativeLink", () => {
  it("percent-encodes each segment", () => {
    expect(relativeLink("index", "sub 1/rg (a)/overview", "markdown")).toBe("sub%201/rg%20%28a%29/overview.md");
    expect(relativeLink("sub-1/rg-a/overview", "index", "json")).toBe("../../index.json");
  });
});

describe("structured renderers", () => {
  it("renders JSON with rendered link paths", () => {
    const node = nodeAt("sub-1/rg-web/microsoft.compute-virtualmachines");
    const json = renderJson(node);

    expect(json.endsWith("}\n")).toBe(true);
    const parsed: unknown = JSON.parse(json);
    expect(parsed).toMatchObject({
      path: "docs/sub-1/rg-web/microsoft.compute-virtualmachines.json",
      title: "Microsoft.Compute/virtualMachines in rg-web",
      kind: "ResourceTypeListing",
      links: [{ title: "rg-web", path: "docs/sub-1/rg-web/overview.json" }],
    });
    expect(parsed).toEqual(toStructuredDocument(node, "json"));
  });

  it("renders YAML of the same document", () => {
    const node = nodeAt("index");
    expect(YAML.parse(renderYaml(node))).toEqual(toStructuredDocument(node, "yaml"));
  });
});
