import { z } from "zod";
import { compact, decodeWith, oneOf, optional } from "../codec.js";
import { DecodeError, type WirePath } from "../errors.js";
import { isRecord, ownRecord, type JsonObject } from "../json.js";
import { sortedByKey } from "../canonical-json.js";

export const SCHEMA_TYPES = [
  "object",
  "number",
  "string",
  "array",
  "null",
  "boolean",
] as const;

export type SchemaType = (typeof SCHEMA_TYPES)[number];

export const DEFAULT_MAX_SCHEMA_DEPTH = 64;

/**
 * One node of a JSON-Schema-like parameter description.
 *
 * `properties` and `required` only mean something on `object` nodes and
 * `items` only on `array` nodes. Nothing here enforces that; whatever the
 * caller builds is carried through decode and encode as-is.
 */
export interface ParameterSchema {
  schemaType: SchemaType;
  description?: string | undefined;
  enumValues?: string[] | undefined;
  properties?: Record<string, ParameterSchema> | undefined;
  required?: string[] | undefined;
  items?: ParameterSchema | undefined;
}

export interface SchemaDecodeOptions {
  maxDepth?: number;
}

// Not exported: decoding goes through decodeParameterSchema so the depth
// check always runs first.
const ParameterSchemaSchema: z.ZodType<ParameterSchema, z.ZodTypeDef, unknown> =
  z.lazy(() =>
    z
      .object({
        type: z.enum(SCHEMA_TYPES),
        description: optional(z.string()),
        enum_values: optional(z.array(z.string())),
        properties: optional(ownRecord(ParameterSchemaSchema)),
        required: optional(z.array(z.string())),
        items: optional(ParameterSchemaSchema),
      })
      .transform(
        (node): ParameterSchema => ({
          schemaType: node.type,
          description: node.description,
          enumValues: node.enum_values,
          properties: node.properties,
          required: node.required,
          items: node.items,
        }),
      ),
  );

export interface SchemaDepthEntry {
  node: unknown;
  depth: number;
  path: WirePath;
}

/**
 * Finds the first node nested deeper than `maxDepth` through `properties`
 * or `items`. Iterative, so a hostile document can't exhaust the stack
 * before the parser sees it.
 */
export function findDepthViolation(
  value: unknown,
  maxDepth: number,
): SchemaDepthEntry | undefined {
  const pending: SchemaDepthEntry[] = [{ node: value, depth: 1, path: [] }];

  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const { node, depth, path } = entry;
    if (!isRecord(node)) continue;
    if (depth > maxDepth) return entry;

    const { properties, items } = node;
    if (isRecord(properties)) {
      for (const [name, child] of Object.entries(properties)) {
        pending.push({ node: child, depth: depth + 1, path: [...path, "properties", name] });
      }
    }
    if (items !== undefined) {
      pending.push({ node: items, depth: depth + 1, path: [...path, "items"] });
    }
  }
  return undefined;
}

export function decodeParameterSchema(
  value: unknown,
  { maxDepth = DEFAULT_MAX_SCHEMA_DEPTH }: SchemaDecodeOptions = {},
  path: WirePath = [],
): ParameterSchema {
  const violation = findDepthViolation(value, maxDepth);
  if (violation) {
    throw new DecodeError(
      "DepthExceeded",
      [...path, ...violation.path],
      `at most ${String(maxDepth)} nested levels`,
      `${String(violation.depth)} levels`,
    );
  }
  return decodeWith(ParameterSchemaSchema, value, path);
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Encodes a schema tree. `properties` is marked for ascending key order, so
 * {@link stringifyCanonical} gives identical bytes for equal trees however
 * they were assembled.
 */
export function encodeParameterSchema(
  schema: ParameterSchema,
  path: WirePath = [],
): JsonObject {
  const properties =
    schema.properties &&
    sortedByKey(
      Object.fromEntries(
        Object.entries(schema.properties)
          .sort(byKey)
          .map(([name, child]): [string, JsonObject] => [
            name,
            encodeParameterSchema(child, [...path, "properties", name]),
          ]),
      ),
    );

  return compact({
    type: oneOf(SCHEMA_TYPES, schema.schemaType, [...path, "type"]),
    description: schema.description,
    enum_values: schema.enumValues,
    properties,
    required: schema.required,
    items: schema.items && encodeParameterSchema(schema.items, [...path, "items"]),
  });
}
