/**
 * Document Model Builder
 *
 * Turns a snapshot into the document tree. The tree is a pure function of the
 * snapshot: every list is sorted with `compareText`, so the same snapshot
 * always yields the same tree.
 */

import { InvariantViolationError } from "../errors.js";
import { UNKNOWN, type CollectionFailure, type ResourceGroup, type ResourceRecord, type Snapshot, type Subscription } from "../types.js";
import {
  INDEX_PATH,
  SUMMARY_PATH,
  compareText,
  listingPath,
  resourceGroupPath,
  subscriptionPath,
} from "./paths.js";
import type { DocumentLink, DocumentNode, ResourceTypeSummaryContent } from "./types.js";

const INDEX_TITLE = "Azure Resource Documentation";
const SUMMARY_TITLE = "Resource Types";

// =============================================================================
// Invariants
// =============================================================================

/** Unknown ids are normalization gaps, not collisions. */
function findDuplicates(kind: string, ids: string[]): string[] {
  const seen = new Set<string>();
  const violations: string[] = [];
  for (const id of ids) {
    if (id === UNKNOWN) continue;
    const key = id.toLowerCase();
    if (seen.has(key)) violations.push(`Duplicate ${kind} id: ${id}`);
    seen.add(key);
  }
  return violations;
}

/**
 * Check the structural rules of a snapshot. Returns one message per violation.
 */
export function validateSnapshot(snapshot: Snapshot): string[] {
  const violations = [
    ...findDuplicates("subscription", snapshot.subscriptions.map((s) => s.id)),
    ...findDuplicates("resource group", snapshot.resourceGroups.map((g) => g.id)),
    ...findDuplicates("resource", snapshot.resources.map((r) => r.id)),
  ];

  const subscriptionIds = new Set(snapshot.subscriptions.map((s) => s.id.toLowerCase()));
  for (const group of snapshot.resourceGroups) {
    if (!subscriptionIds.has(group.subscriptionId.toLowerCase())) {
      violations.push(`Resource group ${group.id} references unknown subscription ${group.subscriptionId}`);
    }
  }

  const groupIds = new Set(snapshot.resourceGroups.map((g) => g.id.toLowerCase()));
  for (const record of snapshot.resources) {
    if (!groupIds.has(record.resourceGroupId.toLowerCase())) {
      violations.push(`Resource ${record.id} references unknown resource group ${record.resourceGroupId}`);
    }
  }

  return violations;
}

function findPathClashes(root: DocumentNode): string[] {
  const seen = new Map<string, string>();
  const violations: string[] = [];
  const visit = (node: DocumentNode) => {
    const key = node.path.toLowerCase();
    const first = seen.get(key);
    if (first !== undefined) violations.push(`Path clash: "${first}" and "${node.title}" both resolve to ${node.path}`);
    else seen.set(key, node.title);
    node.children.forEach(visit);
  };
  visit(root);
  return violations;
}

// =============================================================================
// Grouping
// =============================================================================

function byName<T extends { id: string }>(name: (item: T) => string) {
  return (a: T, b: T) => compareText(name(a), name(b)) || compareText(a.id, b.id);
}

/** Order of failures in documents and the export: subscription, group, scope, message. */
export function compareFailures(a: CollectionFailure, b: CollectionFailure): number {
  return (
    compareText(a.subscriptionId, b.subscriptionId) ||
    compareText(a.resourceGroup ?? "", b.resourceGroup ?? "") ||
    compareText(a.scope, b.scope) ||
    compareText(a.message, b.message)
  );
}

type TypeBucket = { type: string; records: ResourceRecord[] };

/**
 * Bucket records by type, ignoring case. A bucket is labelled with the
 * smallest spelling of its type.
 */
function groupByType(records: ResourceRecord[]): TypeBucket[] {
  const buckets = new Map<string, TypeBucket>();
  for (const record of records) {
    const key = record.type.toLowerCase();
    const bucket = buckets.get(key);
    if (!bucket) {
      buckets.set(key, { type: record.type, records: [record] });
      continue;
    }
    bucket.records.push(record);
    if (record.type < bucket.type) bucket.type = record.type;
  }
  return [...buckets.values()]
    .map((b) => ({ type: b.type, records: [...b.records].sort(byName<ResourceRecord>((r) => r.name)) }))
    .sort((a, b) => compareText(a.type, b.type));
}

// =============================================================================
// Builder
// =============================================================================

function buildGroupNode(subscription: Subscription, group: ResourceGroup, records: ResourceRecord[]): DocumentNode {
  const path = resourceGroupPath(subscription.id, group.name);
  const buckets = groupByType(records);

  const listings = buckets.map((bucket): DocumentNode => ({
    path: listingPath(subscription.id, group.name, bucket.type),
    title: `${bucket.type} in ${group.name}`,
    kind: "ResourceTypeListing",
    links: [{ title: group.name, path }],
    content: { kind: "ResourceTypeListing", subscription, group, type: bucket.type, records: bucket.records },
    children: [],
  }));

  return {
    path,
    title: `Resource Group: ${group.name}`,
    kind: "ResourceGroupOverview",
    links: [
      { title: subscription.displayName, path: subscriptionPath(subscription.id) },
      ...listings.map((l): DocumentLink => ({ title: l.title, path: l.path })),
    ],
    content: {
      kind: "ResourceGroupOverview",
      subscription,
      group,
      types: buckets.map((b, i) => ({ type: b.type, count: b.records.length, path: listings[i].path })),
    },
    children: listings,
  };
}

function buildSummary(groupNodes: DocumentNode[]): DocumentNode {
  const totals = new Map<string, ResourceTypeSummaryContent["types"][number]>();
  for (const node of groupNodes) {
    if (node.content.kind !== "ResourceGroupOverview") continue;
    const { subscription, group } = node.content;
    for (const entry of node.content.types) {
      const key = entry.type.toLowerCase();
      let row = totals.get(key);
      if (!row) {
        row = { type: entry.type, count: 0, listings: [] };
        totals.set(key, row);
      }
      if (entry.type < row.type) row.type = entry.type;
      row.count += entry.count;
      row.listings.push({ subscriptionId: subscription.id, resourceGroup: group.name, count: entry.count, path: entry.path });
    }
  }

  const types = [...totals.values()].sort((a, b) => compareText(a.type, b.type));
  return {
    path: SUMMARY_PATH,
    title: SUMMARY_TITLE,
    kind: "ResourceTypeSummary",
    links: [
      { title: INDEX_TITLE, path: INDEX_PATH },
      ...types.flatMap((t) => t.listings.map((l): DocumentLink => ({ title: `${t.type} in ${l.resourceGroup}`, path: l.path }))),
    ],
    content: { kind: "ResourceTypeSummary", types },
    children: [],
  };
}

/**
 * Validate the snapshot and build the document tree.
 *
 * @throws InvariantViolationError listing every violation found.
 */
export function buildDocumentTree(snapshot: Snapshot): DocumentNode {
  const violations = validateSnapshot(snapshot);
  if (violations.length > 0) {
    throw new InvariantViolationError(`Snapshot violates ${violations.length} invariant(s)`, violations);
  }

  const failures = [...snapshot.failures].sort(compareFailures);
  const subscriptions = [...snapshot.subscriptions].sort(byName<Subscription>((s) => s.displayName));

  const recordsByGroup = new Map<string, ResourceRecord[]>();
  for (const record of snapshot.resources) {
    const key = record.resourceGroupId.toLowerCase();
    const list = recordsByGroup.get(key) ?? [];
    list.push(record);
    recordsByGroup.set(key, list);
  }

  const allGroupNodes: DocumentNode[] = [];
  const subscriptionNodes = subscriptions.map((subscription): DocumentNode => {
    const path = subscriptionPath(subscription.id);
    const groups = snapshot.resourceGroups
      .filter((g) => g.subscriptionId.toLowerCase() === subscription.id.toLowerCase())
      .sort(byName<ResourceGroup>((g) => g.name));
    const groupNodes = groups.map((group) =>
      buildGroupNode(subscription, group, recordsByGroup.get(group.id.toLowerCase()) ?? []),
    );
    allGroupNodes.push(...groupNodes);

    return {
      path,
      title: `Subscription: ${subscription.displayName}`,
      kind: "SubscriptionOverview",
      links: [
        { title: INDEX_TITLE, path: INDEX_PATH },
        ...groupNodes.map((n, i): DocumentLink => ({ title: groups[i].name, path: n.path })),
      ],
      content: {
        kind: "SubscriptionOverview",
        subscription,
        resourceGroups: groups.map((group, i) => ({
          group,
          path: groupNodes[i].path,
          resources: recordsByGroup.get(group.id.toLowerCase())?.length ?? 0,
        })),
        failures: failures.filter((f) => f.subscriptionId.toLowerCase() === subscription.id.toLowerCase()),
      },
      children: groupNodes,
    };
  });

  const summary = buildSummary(allGroupNodes);

  const root: DocumentNode = {
    path: INDEX_PATH,
    title: INDEX_TITLE,
    kind: "Index",
    links: [
      ...subscriptionNodes.map((n, i): DocumentLink => ({ title: subscriptions[i].displayName, path: n.path })),
      { title: SUMMARY_TITLE, path: SUMMARY_PATH },
    ],
    content: {
      kind: "Index",
      totals: {
        subscriptions: snapshot.subscriptions.length,
        resourceGroups: snapshot.resourceGroups.length,
        resources: snapshot.resources.length,
        failures: snapshot.failures.length,
      },
      subscriptions: subscriptionNodes.map((node, i) => {
        const content = node.content;
        const groups = content.kind === "SubscriptionOverview" ? content.resourceGroups : [];
        return {
          subscription: subscriptions[i],
          path: node.path,
          resourceGroups: groups.length,
          resources: groups.reduce((sum, g) => sum + g.resources, 0),
          failures: content.kind === "SubscriptionOverview" ? content.failures.length : 0,
        };
      }),
      summaryPath: SUMMARY_PATH,
      failures,
    },
    children: [...subscriptionNodes, summary],
  };

  const clashes = findPathClashes(root);
  if (clashes.length > 0) {
    throw new InvariantViolationError(`Document tree has ${clashes.length} path clash(es)`, clashes);
  }

  return root;
}

/** Pre-order walk of the tree. */
export function flattenTree(root: DocumentNode): DocumentNode[] {
  return [root, ...root.children.flatMap(flattenTree)];
}
