/**
 * Node paths and locale-independent ordering.
 */

export const INDEX_PATH = "index";
export const SUMMARY_PATH = "resource-types";

const UNSAFE_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;
const RESERVED_NAMES = /^(con|prn|aux|nul|com\d|lpt\d)$/i;

/**
 * Make one path segment safe for common file systems.
 */
export function sanitizeSegment(segment: string): string {
  let safe = segment.replace(UNSAFE_CHARS, "_").replace(/[. ]+$/, "");
  if (safe.length === 0 || safe === "." || safe === "..") safe = "_";
  if (RESERVED_NAMES.test(safe)) safe = `_${safe}`;
  return safe;
}

/** `Microsoft.Compute/virtualMachines` → `microsoft.compute-virtualmachines` */
export function typeSlug(type: string): string {
  return sanitizeSegment(type.toLowerCase().replace(/\//g, "-"));
}

export function subscriptionPath(subscriptionId: string): string {
  return `${sanitizeSegment(subscriptionId)}/overview`;
}

export function resourceGroupPath(subscriptionId: string, group: string): string {
  return `${sanitizeSegment(subscriptionId)}/${sanitizeSegment(group)}/overview`;
}

export function listingPath(subscriptionId: string, group: string, type: string): string {
  return `${sanitizeSegment(subscriptionId)}/${sanitizeSegment(group)}/${typeSlug(type)}`;
}

/**
 * Case-insensitive code-unit comparison with the raw comparison as the
 * tie-break. Independent of locale.
 */
export function compareText(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a !== b) return a < b ? -1 : 1;
  return 0;
}
