/**
 * Resource Handlers
 *
 * Typed handlers are data: a resource type, an optional api version for the
 * detail fetch, and the fields to project out of the payload. The built-in set
 * lives in data/resource-handlers.json; extra files extend or override it.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "../errors.js";

// =============================================================================
// Schema
// =============================================================================

export const handlerFieldSchema = Type.Recursive(
  (This) =>
    Type.Object(
      {
        key: Type.String({ minLength: 1 }),
        /** Dotted path; `a[]` projects over an array, `|` separates alternatives. */
        path: Type.String({ minLength: 1 }),
        fields: Type.Optional(Type.Array(This, { minItems: 1 })),
      },
      { additionalProperties: false },
    ),
  { $id: "HandlerField" },
);

export const handlerSpecSchema = Type.Object(
  {
    type: Type.String({ minLength: 1 }),
    apiVersion: Type.Optional(Type.String({ minLength: 1 })),
    fields: Type.Array(handlerFieldSchema, { minItems: 1 }),
  },
  { additionalProperties: false },
);

export const handlerFileSchema = Type.Object(
  { handlers: Type.Array(handlerSpecSchema) },
  { additionalProperties: false },
);

export type HandlerField = Static<typeof handlerFieldSchema>;
export type HandlerSpec = Static<typeof handlerSpecSchema>;
export type HandlerFile = Static<typeof handlerFileSchema>;

export const BUILTIN_HANDLERS_URL = new URL("../../data/resource-handlers.json", import.meta.url);

// =============================================================================
// Registry
// =============================================================================

export class HandlerRegistry {
  private readonly byType = new Map<string, HandlerSpec>();

  constructor(specs: HandlerSpec[] = []) {
    for (const spec of specs) this.byType.set(spec.type.toLowerCase(), spec);
  }

  /** Lookup is case-insensitive, as Azure resource types are. */
  get(type: string): HandlerSpec | undefined {
    return this.byType.get(type.toLowerCase());
  }

  apiVersion(type: string): string | undefined {
    return this.get(type)?.apiVersion;
  }

  get size(): number {
    return this.byType.size;
  }

  /** A new registry where `specs` replace handlers of the same type. */
  extend(specs: HandlerSpec[]): HandlerRegistry {
    return new HandlerRegistry([...this.byType.values(), ...specs]);
  }
}

// =============================================================================
// Loading
// =============================================================================

export function parseHandlerFile(input: unknown, source: string): HandlerFile {
  if (Value.Check(handlerFileSchema, input)) return input;

  const errors = [...Value.Errors(handlerFileSchema, input)].map((error) => `${error.path || "/"}: ${error.message}`);
  throw new ConfigError(`Invalid handler file ${source}`, errors);
}

export async function loadHandlerFile(file: string | URL): Promise<HandlerSpec[]> {
  const source = String(file);
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read handler file ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Handler file ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseHandlerFile(parsed, source).handlers;
}

/**
 * The built-in handlers, extended by each extra file in order.
 */
export async function loadHandlerRegistry(extraFiles: string[] = []): Promise<HandlerRegistry> {
  let registry = new HandlerRegistry(await loadHandlerFile(BUILTIN_HANDLERS_URL));
  for (const file of extraFiles) {
    registry = registry.extend(await loadHandlerFile(file));
  }
  return registry;
}
