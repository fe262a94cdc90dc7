export {
  AzureSubscriptionSource,
  SubscriptionEnumerator,
  toSubscription,
} from "./manager.js";

export type { SubscriptionEnumeratorOptions } from "./manager.js";
export type { EnumerationResult, RawSubscription, RawTenant, SubscriptionSource, TenantInfo } from "./types.js";
