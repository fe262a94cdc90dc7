/**
 * Data export: the whole snapshot plus raw payloads as one JSON file, and the
 * parser that reads it back.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ExportFormatError } from "../errors.js";
import { toPropertyValue } from "../normalizer/index.js";
import type { PropertyMap, PropertyValue, ResourceRecord, Snapshot } from "../types.js";

export const EXPORT_FORMAT_VERSION = 1;

const stringMap = Type.Record(Type.String(), Type.String());

export const dataExportSchema = Type.Object({
  formatVersion: Type.Literal(EXPORT_FORMAT_VERSION),
  generatedAt: Type.String(),
  subscriptions: Type.Array(Type.Object({ id: Type.String(), displayName: Type.String() })),
  resourceGroups: Type.Array(
    Type.Object({
      id: Type.String(),
      name: Type.String(),
      subscriptionId: Type.String(),
      location: Type.String(),
      tags: stringMap,
    }),
  ),
  resources: Type.Array(
    Type.Object({
      id: Type.String(),
      name: Type.String(),
      type: Type.String(),
      resourceGroupId: Type.String(),
      location: Type.String(),
      tags: stringMap,
      properties: Type.Record(Type.String(), Type.Unknown()),
      rawSchemaVersion: Type.String(),
      handler: Type.Union([Type.Literal("typed"), Type.Literal("generic")]),
    }),
  ),
  rawPayloads: Type.Array(
    Type.Object({
      id: Type.String(),
      type: Type.String(),
      apiVersion: Type.Optional(Type.String()),
      payload: Type.Unknown(),
    }),
  ),
  failures: Type.Array(
    Type.Object({
      scope: Type.Union([Type.Literal("subscription"), Type.Literal("resourceGroup")]),
      subscriptionId: Type.String(),
      resourceGroup: Type.Optional(Type.String()),
      reason: Type.Union([Type.Literal("permanent"), Type.Literal("retries-exhausted")]),
      code: Type.Optional(Type.String()),
      statusCode: Type.Optional(Type.Number()),
      message: Type.String(),
      attempts: Type.Number(),
    }),
  ),
});

export type DataExportDocument = Static<typeof dataExportSchema>;

export type RawPayloadEntry = {
  id: string;
  type: string;
  apiVersion?: string;
  payload: PropertyValue;
};

export type ParsedDataExport = {
  generatedAt: string;
  snapshot: Snapshot;
  rawPayloads: RawPayloadEntry[];
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `data/azure_resources_{YYYY-MM-DD-HH-mm-ss}.json`, in UTC. */
export function dataExportPath(timestamp: Date): string {
  const stamp = [
    timestamp.getUTCFullYear(),
    pad(timestamp.getUTCMonth() + 1),
    pad(timestamp.getUTCDate()),
    pad(timestamp.getUTCHours()),
    pad(timestamp.getUTCMinutes()),
    pad(timestamp.getUTCSeconds()),
  ].join("-");
  return `data/azure_resources_${stamp}.json`;
}

export function renderDataExport(
  snapshot: Snapshot,
  rawPayloads: RawPayloadEntry[],
  timestamp: Date,
): { path: string; content: string } {
  const document: DataExportDocument = {
    formatVersion: EXPORT_FORMAT_VERSION,
    generatedAt: timestamp.toISOString(),
    subscriptions: snapshot.subscriptions,
    resourceGroups: snapshot.resourceGroups,
    resources: snapshot.resources,
    rawPayloads: rawPayloads.map((entry) => ({ ...entry, payload: toPropertyValue(entry.payload) })),
    failures: snapshot.failures,
  };
  return { path: dataExportPath(timestamp), content: `${JSON.stringify(document, null, 2)}\n` };
}

function toPropertyMap(source: Record<string, unknown>): PropertyMap {
  const map: PropertyMap = {};
  for (const [key, value] of Object.entries(source)) map[key] = toPropertyValue(value);
  return map;
}

/**
 * Parse and validate a data export.
 *
 * @throws ExportFormatError listing each schema error path.
 */
export function parseDataExport(text: string): ParsedDataExport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ExportFormatError(`Data export is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!Value.Check(dataExportSchema, parsed)) {
    const errors = [...Value.Errors(dataExportSchema, parsed)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ExportFormatError("Invalid data export", errors);
  }

  const resources: ResourceRecord[] = parsed.resources.map((r) => ({ ...r, properties: toPropertyMap(r.properties) }));
  return {
    generatedAt: parsed.generatedAt,
    snapshot: {
      subscriptions: parsed.subscriptions,
      resourceGroups: parsed.resourceGroups,
      resources,
      failures: parsed.failures,
    },
    rawPayloads: parsed.rawPayloads.map((entry) => {
      const result: RawPayloadEntry = { id: entry.id, type: entry.type, payload: toPropertyValue(entry.payload) };
      if (entry.apiVersion !== undefined) result.apiVersion = entry.apiVersion;
      return result;
    }),
  };
}
