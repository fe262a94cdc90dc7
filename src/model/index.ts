export { buildDocumentTree, compareFailures, flattenTree, validateSnapshot } from "./builder.js";
export {
  INDEX_PATH,
  SUMMARY_PATH,
  compareText,
  listingPath,
  resourceGroupPath,
  sanitizeSegment,
  subscriptionPath,
  typeSlug,
} from "./paths.js";
export type {
  DocumentLink,
  DocumentNode,
  IndexContent,
  NodeContent,
  NodeKind,
  ResourceGroupOverviewContent,
  ResourceTypeListingContent,
  ResourceTypeSummaryContent,
  RunTotals,
  SubscriptionOverviewContent,
} from "./types.js";
