import { z } from "zod";
import { EncodeError, fromZodError, type WirePath } from "./errors.js";
import { describeJson, type JsonObject, type JsonValue } from "./json.js";

/**
 * Runs a wire schema over a parsed JSON value and returns the model value,
 * or throws the {@link DecodeError} for the first failure.
 *
 * `basePath` roots error paths when the value was taken out of a larger
 * document.
 */
export function decodeWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  basePath: WirePath = [],
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw fromZodError(result.error, value, basePath);
  }
  return result.data;
}

/** Optional on the wire: a missing key and an explicit null both decode as unset. */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

/** Drops unset fields, keeping the declaration order of the rest. */
export function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function finite(value: number, path: WirePath): number {
  if (!Number.isFinite(value)) {
    throw new EncodeError("TypeMismatch", path, "finite number", String(value));
  }
  return value;
}

export function integer(value: number, path: WirePath): number {
  if (!Number.isInteger(value)) {
    throw new EncodeError("TypeMismatch", path, "integer", String(value));
  }
  return value;
}

export function oneOf<T extends string>(
  allowed: readonly T[],
  value: T,
  path: WirePath,
): T {
  if (!allowed.includes(value)) {
    throw new EncodeError(
      "TypeMismatch",
      path,
      allowed.map((a) => JSON.stringify(a)).join(" | "),
      JSON.stringify(value),
    );
  }
  return value;
}

/** Walks caller-supplied opaque JSON so nothing unrepresentable reaches the wire. */
export function checkJson(value: JsonValue, path: WirePath): JsonValue {
  if (typeof value === "number") return finite(value, path);
  if (Array.isArray(value)) {
    value.forEach((item, i) => checkJson(item, [...path, i]));
  } else if (value !== null && typeof value === "object") {
    for (const [key, item] of Object.entries(value)) checkJson(item, [...path, key]);
  }
  return value;
}

/** Thrown from the default branch of an exhaustive switch over a union tag. */
export function unrepresentable(value: never, path: WirePath, expected: string): never {
  throw new EncodeError("TypeMismatch", path, expected, describeJson(value));
}
