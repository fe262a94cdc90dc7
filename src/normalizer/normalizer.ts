/**
 * Schema Normalizer
 *
 * Maps raw provider payloads onto canonical resource records. Types with a
 * handler get their declared fields; every other type falls back to a generic
 * copy of the payload. Normalization never throws for parseable input.
 */

import { UNKNOWN, type PropertyMap, type PropertyValue, type RawResource, type ResourceRecord } from "../types.js";
import type { HandlerField, HandlerRegistry, HandlerSpec } from "./handlers.js";
import { isPlainRecord, readFirstPath, toPropertyValue } from "./values.js";

export type NormalizeContext = {
  resourceGroupId: string;
  registry: HandlerRegistry;
};

function stringField(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === "string" && value.length > 0 ? value : UNKNOWN;
}

function readTags(payload: Record<string, unknown>): Record<string, string> {
  const tags: Record<string, string> = {};
  const raw = payload.tags;
  if (!isPlainRecord(raw)) return tags;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") tags[key] = value;
    else if (typeof value === "number" || typeof value === "boolean") tags[key] = String(value);
  }
  return tags;
}

function shapeValue(value: unknown, fields: HandlerField[]): PropertyValue {
  if (Array.isArray(value)) return value.map((item) => shapeValue(item, fields));
  if (value === undefined) return UNKNOWN;
  if (value === null) return null;
  return projectFields(value, fields);
}

function projectFields(source: unknown, fields: HandlerField[]): PropertyMap {
  const map: PropertyMap = {};
  for (const field of fields) {
    const value = readFirstPath(source, field.path);
    map[field.key] = field.fields ? shapeValue(value, field.fields) : toPropertyValue(value);
  }
  return map;
}

/**
 * Copy every top-level field, flattening one level of nesting into dotted
 * keys. Deeper values stay nested, and so does a mapping whose dotted key
 * would collide with a literal top-level key.
 */
export function flattenGeneric(payload: Record<string, unknown>): PropertyMap {
  const map: PropertyMap = {};
  const topLevel = new Set(Object.keys(payload));
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value === "function" || typeof value === "symbol") continue;
    if (
      isPlainRecord(value) &&
      Object.keys(value).length > 0 &&
      !Object.keys(value).some((child) => topLevel.has(`${key}.${child}`))
    ) {
      for (const [child, nested] of Object.entries(value)) {
        if (typeof nested === "function" || typeof nested === "symbol") continue;
        map[`${key}.${child}`] = toPropertyValue(nested, [payload, value]);
      }
      continue;
    }
    map[key] = toPropertyValue(value, [payload]);
  }
  return map;
}

function schemaVersion(raw: RawResource, handler: HandlerSpec | undefined): string {
  if (handler?.apiVersion) return handler.apiVersion;
  if (raw.apiVersion) return raw.apiVersion;
  const fromPayload = raw.payload.apiVersion;
  return typeof fromPayload === "string" && fromPayload.length > 0 ? fromPayload : UNKNOWN;
}

/** A payload without an id is addressed by its group, type and name when those are known. */
function resourceId(payload: Record<string, unknown>, type: string, name: string, resourceGroupId: string): string {
  const id = stringField(payload, "id");
  if (id !== UNKNOWN || type === UNKNOWN || name === UNKNOWN) return id;
  return `${resourceGroupId}/providers/${type}/${name}`;
}

export function normalizeResource(raw: RawResource, context: NormalizeContext): ResourceRecord {
  const handler = context.registry.get(raw.type);
  const { payload } = raw;
  const name = stringField(payload, "name");
  const type = raw.type || stringField(payload, "type");

  return {
    id: resourceId(payload, type, name, context.resourceGroupId),
    name,
    type,
    resourceGroupId: context.resourceGroupId,
    location: stringField(payload, "location"),
    tags: readTags(payload),
    properties: handler ? projectFields(payload, handler.fields) : flattenGeneric(payload),
    rawSchemaVersion: schemaVersion(raw, handler),
    handler: handler ? "typed" : "generic",
  };
}
