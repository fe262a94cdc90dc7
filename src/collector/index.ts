export { DEFAULT_CONCURRENCY, ResourceCollector } from "./collector.js";
export type { CollectedResource, CollectionProgress, CollectionResult, CollectorOptions } from "./collector.js";
export { FailureReport, failureFromOutcome } from "./failure-report.js";
