/**
 * Markdown renderer.
 */

import type {
  DocumentNode,
  IndexContent,
  ResourceGroupOverviewContent,
  ResourceTypeListingContent,
  ResourceTypeSummaryContent,
  SubscriptionOverviewContent,
} from "../model/index.js";
import type { CollectionFailure, PropertyValue, ResourceRecord } from "../types.js";
import { relativeLink } from "./links.js";

// =============================================================================
// Text Helpers
// =============================================================================

/** Escape Markdown syntax in running text and table cells. */
export function escapeMarkdown(text: string): string {
  return text.replace(/\r?\n/g, " ").replace(/[\\`*_[\]#|<>~]/g, "\\$&");
}

function link(from: DocumentNode, title: string, to: string): string {
  return `[${escapeMarkdown(title)}](${relativeLink(from.path, to, "markdown")})`;
}

function table(headers: string[], rows: string[][]): string[] {
  return [
    `| ${headers.join(" | ")} |`,
    `| ${headers.map(() => "---").join(" | ")} |`,
    ...rows.map((row) => `| ${row.join(" | ")} |`),
  ];
}

function formatTags(tags: Record<string, string>): string {
  const entries = Object.entries(tags).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) return "none";
  return entries.map(([k, v]) => escapeMarkdown(`${k}=${v}`)).join(", ");
}

function scalar(value: PropertyValue): string {
  if (value === null) return "null";
  if (typeof value === "string") return escapeMarkdown(value);
  return String(value);
}

/**
 * Render a property value as an indented list.
 */
export function propertyLines(key: string, value: PropertyValue, depth = 0): string[] {
  const indent = "  ".repeat(depth);
  const label = `${indent}- **${escapeMarkdown(key)}:**`;

  if (Array.isArray(value)) {
    if (value.length === 0) return [`${label} []`];
    return [
      label,
      ...value.flatMap((item, i) =>
        item !== null && typeof item === "object"
          ? propertyLines(`[${i}]`, item, depth + 1)
          : [`${indent}  - ${scalar(item)}`],
      ),
    ];
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value);
    if (entries.length === 0) return [`${label} {}`];
    return [label, ...entries.flatMap(([k, v]) => propertyLines(k, v, depth + 1))];
  }
  return [`${label} ${scalar(value)}`];
}

function failureSection(failures: CollectionFailure[]): string[] {
  if (failures.length === 0) return ["## Failures", "", "No failures."];
  return [
    "## Failures",
    "",
    ...table(
      ["Scope", "Subscription", "Resource Group", "Reason", "Attempts", "Message"],
      failures.map((f) => [
        f.scope,
        escapeMarkdown(f.subscriptionId),
        f.resourceGroup ? escapeMarkdown(f.resourceGroup) : "-",
        f.reason,
        String(f.attempts),
        escapeMarkdown(f.message),
      ]),
    ),
  ];
}

// =============================================================================
// Node Renderers
// =============================================================================

function renderIndex(node: DocumentNode, content: IndexContent): string[] {
  const { totals } = content;
  return [
    "## Summary",
    "",
    ...table(
      ["Subscriptions", "Resource Groups", "Resources", "Failures"],
      [[String(totals.subscriptions), String(totals.resourceGroups), String(totals.resources), String(totals.failures)]],
    ),
    "",
    "## Subscriptions",
    "",
    ...(content.subscriptions.length === 0
      ? ["No subscriptions."]
      : table(
          ["Subscription", "ID", "Resource Groups", "Resources", "Failures"],
          content.subscriptions.map((s) => [
            link(node, s.subscription.displayName, s.path),
            escapeMarkdown(s.subscription.id),
            String(s.resourceGroups),
            String(s.resources),
            String(s.failures),
          ]),
        )),
    "",
    `See ${link(node, "Resource Types", content.summaryPath)} for every resource type in this run.`,
    "",
    ...failureSection(content.failures),
  ];
}

function renderSubscription(node: DocumentNode, content: SubscriptionOverviewContent): string[] {
  const [parent] = node.links;
  return [
    link(node, parent.title, parent.path),
    "",
    `- **Subscription ID:** ${escapeMarkdown(content.subscription.id)}`,
    "",
    "## Resource Groups",
    "",
    ...(content.resourceGroups.length === 0
      ? ["No resource groups."]
      : table(
          ["Name", "Location", "Resources"],
          content.resourceGroups.map((g) => [
            link(node, g.group.name, g.path),
            escapeMarkdown(g.group.location),
            String(g.resources),
          ]),
        )),
    "",
    ...failureSection(content.failures),
  ];
}

function renderGroup(node: DocumentNode, content: ResourceGroupOverviewContent): string[] {
  const [parent] = node.links;
  return [
    link(node, parent.title, parent.path),
    "",
    `- **ID:** ${escapeMarkdown(content.group.id)}`,
    `- **Location:** ${escapeMarkdown(content.group.location)}`,
    `- **Tags:** ${formatTags(content.group.tags)}`,
    "",
    "## Resource Types",
    "",
    ...(content.types.length === 0
      ? ["No resources."]
      : table(
          ["Type", "Count"],
          content.types.map((t) => [link(node, t.type, t.path), String(t.count)]),
        )),
  ];
}

function renderRecord(record: ResourceRecord): string[] {
  const properties = Object.entries(record.properties);
  return [
    `## ${escapeMarkdown(record.name)}`,
    "",
    `- **ID:** ${escapeMarkdown(record.id)}`,
    `- **Location:** ${escapeMarkdown(record.location)}`,
    `- **Schema version:** ${escapeMarkdown(record.rawSchemaVersion)}`,
    `- **Handler:** ${record.handler}`,
    `- **Tags:** ${formatTags(record.tags)}`,
    "",
    "### Properties",
    "",
    ...(properties.length === 0 ? ["No properties."] : properties.flatMap(([k, v]) => propertyLines(k, v))),
    "",
  ];
}

function renderListing(node: DocumentNode, content: ResourceTypeListingContent): string[] {
  const [parent] = node.links;
  return [link(node, parent.title, parent.path), "", ...content.records.flatMap(renderRecord)];
}

function renderSummary(node: DocumentNode, content: ResourceTypeSummaryContent): string[] {
  const [parent] = node.links;
  return [
    link(node, parent.title, parent.path),
    "",
    ...(content.types.length === 0
      ? ["No resources."]
      : table(
          ["Type", "Count", "Listings"],
          content.types.map((t) => [
            escapeMarkdown(t.type),
            String(t.count),
            t.listings.map((l) => `${link(node, `${l.subscriptionId}/${l.resourceGroup}`, l.path)} (${l.count})`).join(", "),
          ]),
        )),
  ];
}

function renderBody(node: DocumentNode): string[] {
  const { content } = node;
  switch (content.kind) {
    case "Index":
      return renderIndex(node, content);
    case "SubscriptionOverview":
      return renderSubscription(node, content);
    case "ResourceGroupOverview":
      return renderGroup(node, content);
    case "ResourceTypeListing":
      return renderListing(node, content);
    case "ResourceTypeSummary":
      return renderSummary(node, content);
  }
}

export function renderMarkdown(node: DocumentNode): string {
  const lines = [`# ${escapeMarkdown(node.title)}`, "", ...renderBody(node)];
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return `${lines.join("\n")}\n`;
}
