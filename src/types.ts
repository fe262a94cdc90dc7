/**
 * Azure Resource Docs: Shared Types
 *
 * Core type definitions used across the collection, normalization,
 * building and rendering stages.
 */

// =============================================================================
// Hierarchy
// =============================================================================

export type Subscription = {
  id: string;
  displayName: string;
};

export type ResourceGroup = {
  id: string;
  name: string;
  subscriptionId: string;
  location: string;
  tags: Record<string, string>;
};

// =============================================================================
// Canonical Records
// =============================================================================

/** Marker for a field a handler expected but the payload did not carry. */
export const UNKNOWN = "(unknown)";

export type PropertyScalar = string | number | boolean | null;

export type PropertyValue = PropertyScalar | PropertyValue[] | PropertyMap;

export type PropertyMap = { [key: string]: PropertyValue };

export type ResourceHandlerKind = "typed" | "generic";

export type ResourceRecord = {
  id: string;
  name: string;
  type: string;
  resourceGroupId: string;
  location: string;
  tags: Record<string, string>;
  properties: PropertyMap;
  rawSchemaVersion: string;
  handler: ResourceHandlerKind;
};

/** A resource payload as returned by the provider, before normalization. */
export type RawResource = {
  type: string;
  payload: Record<string, unknown>;
  /** Api version the payload was fetched with, when a detail fetch happened. */
  apiVersion?: string;
};

// =============================================================================
// Failures
// =============================================================================

export type FailureScope = "subscription" | "resourceGroup";

export type FailureReason = "permanent" | "retries-exhausted";

export type CollectionFailure = {
  scope: FailureScope;
  subscriptionId: string;
  /** Resource group name, for group-scoped failures. */
  resourceGroup?: string;
  reason: FailureReason;
  code?: string;
  statusCode?: number;
  message: string;
  attempts: number;
};

// =============================================================================
// Snapshot
// =============================================================================

/** Everything one run collected, after normalization. */
export type Snapshot = {
  subscriptions: Subscription[];
  resourceGroups: ResourceGroup[];
  resources: ResourceRecord[];
  failures: CollectionFailure[];
};

// =============================================================================
// Common Configuration
// =============================================================================

export type RetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type OutputFormat = "markdown" | "json" | "yaml";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["markdown", "json", "yaml"];

// =============================================================================
// Pagination
// =============================================================================

/** One page of a cursor-paginated listing. */
export type Page<T> = {
  items: T[];
  continuationToken?: string;
};
