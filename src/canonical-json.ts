import type { JsonObject, JsonValue } from "./json.js";

const keySorted = new WeakSet<JsonObject>();

/** Marks `object` so {@link stringifyCanonical} writes its keys in ascending order. */
export function sortedByKey<T extends JsonObject>(object: T): T {
  keySorted.add(object);
  return object;
}

function byKey([a]: [string, JsonValue], [b]: [string, JsonValue]): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Serializes an encoded wire value. Objects marked with {@link sortedByKey}
 * are written in ascending key order, integer-like keys included; a plain
 * object can't hold that order, since integer keys always enumerate first.
 * Everything else is written as `JSON.stringify` would write it.
 */
export function stringifyCanonical(value: JsonValue, indent = 0): string {
  return write(value, " ".repeat(indent), "");
}

function write(value: JsonValue, step: string, margin: string): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value);

  const inner = margin + step;
  const open = step ? `\n${inner}` : "";
  const close = step ? `\n${margin}` : "";
  const separator = step ? `,\n${inner}` : ",";

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => write(item, step, inner));
    return `[${open}${items.join(separator)}${close}]`;
  }

  const entries = Object.entries(value);
  if (entries.length === 0) return "{}";
  if (keySorted.has(value)) entries.sort(byKey);
  const colon = step ? ": " : ":";
  const members = entries.map(
    ([key, item]) => `${JSON.stringify(key)}${colon}${write(item, step, inner)}`,
  );
  return `{${open}${members.join(separator)}${close}}`;
}
