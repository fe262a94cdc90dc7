/**
 * Document Model Types
 */

import type { CollectionFailure, ResourceGroup, ResourceRecord, Subscription } from "../types.js";

export type NodeKind =
  | "Index"
  | "SubscriptionOverview"
  | "ResourceGroupOverview"
  | "ResourceTypeListing"
  | "ResourceTypeSummary";

export type DocumentLink = {
  title: string;
  /** Node path, relative to the documentation root and without extension. */
  path: string;
};

export type RunTotals = {
  subscriptions: number;
  resourceGroups: number;
  resources: number;
  failures: number;
};

export type IndexContent = {
  kind: "Index";
  totals: RunTotals;
  subscriptions: Array<{
    subscription: Subscription;
    path: string;
    resourceGroups: number;
    resources: number;
    failures: number;
  }>;
  summaryPath: string;
  failures: CollectionFailure[];
};

export type SubscriptionOverviewContent = {
  kind: "SubscriptionOverview";
  subscription: Subscription;
  resourceGroups: Array<{ group: ResourceGroup; path: string; resources: number }>;
  failures: CollectionFailure[];
};

export type ResourceGroupOverviewContent = {
  kind: "ResourceGroupOverview";
  subscription: Subscription;
  group: ResourceGroup;
  types: Array<{ type: string; count: number; path: string }>;
};

export type ResourceTypeListingContent = {
  kind: "ResourceTypeListing";
  subscription: Subscription;
  group: ResourceGroup;
  type: string;
  records: ResourceRecord[];
};

export type ResourceTypeSummaryContent = {
  kind: "ResourceTypeSummary";
  types: Array<{
    type: string;
    count: number;
    listings: Array<{ subscriptionId: string; resourceGroup: string; count: number; path: string }>;
  }>;
};

export type NodeContent =
  | IndexContent
  | SubscriptionOverviewContent
  | ResourceGroupOverviewContent
  | ResourceTypeListingContent
  | ResourceTypeSummaryContent;

export type DocumentNode = {
  path: string;
  title: string;
  kind: NodeKind;
  /** Every node this one links to. */
  links: DocumentLink[];
  content: NodeContent;
  children: DocumentNode[];
};
