/**
 * JSON-safe property values and payload path lookup.
 */

import { UNKNOWN, type PropertyMap, type PropertyValue } from "../types.js";

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isDroppable(value: unknown): boolean {
  return typeof value === "function" || typeof value === "symbol";
}

/**
 * Convert an arbitrary payload value into a property value. `undefined`
 * becomes UNKNOWN, dates become ISO strings, functions and symbols are dropped
 * from containers, and a reference cycle is cut with UNKNOWN.
 */
export function toPropertyValue(value: unknown, ancestors: object[] = []): PropertyValue {
  if (value === undefined || isDroppable(value)) return UNKNOWN;
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? UNKNOWN : value.toISOString();
  if (typeof value !== "object") return UNKNOWN;
  if (ancestors.includes(value)) return UNKNOWN;

  const path = [...ancestors, value];
  if (Array.isArray(value)) {
    return value.filter((item) => !isDroppable(item)).map((item) => toPropertyValue(item, path));
  }

  const map: PropertyMap = {};
  for (const [key, item] of Object.entries(value)) {
    if (isDroppable(item)) continue;
    map[key] = toPropertyValue(item, path);
  }
  return map;
}

/**
 * Read a dotted path from a payload. A segment ending in `[]` projects the
 * rest of the path over the array it names; the result is then an array.
 * Returns undefined when any step is missing.
 */
export function readPath(source: unknown, path: string): unknown {
  return readSegments(source, path.split(".").filter((s) => s.length > 0));
}

function readSegments(source: unknown, segments: string[]): unknown {
  if (segments.length === 0) return source;
  const [segment, ...rest] = segments;
  const project = segment.endsWith("[]");
  const key = project ? segment.slice(0, -2) : segment;

  const next = key.length === 0 ? source : isPlainRecord(source) ? source[key] : undefined;
  if (!project) return readSegments(next, rest);
  if (!Array.isArray(next)) return undefined;
  return next.map((item) => readSegments(item, rest));
}

/**
 * Read the first alternative of `a|b|c` that resolves to a value.
 */
export function readFirstPath(source: unknown, paths: string): unknown {
  for (const path of paths.split("|")) {
    const value = readPath(source, path.trim());
    if (value !== undefined) return value;
  }
  return undefined;
}
