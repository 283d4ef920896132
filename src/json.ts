import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Nesting allowed inside an opaque JSON value; the value itself is level 1. */
export const MAX_JSON_DEPTH = 128;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Names the JSON kind of a value the way error messages report it. */
export function describeJson(value: unknown): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/** Issue params that `fromZodIssue` turns into a `DepthExceeded` error. */
export const DepthIssueParamsSchema = z.object({
  kind: z.literal("DepthExceeded"),
  expected: z.string(),
  actual: z.string(),
});

export type DepthIssueParams = z.infer<typeof DepthIssueParamsSchema>;

export interface NestingViolation {
  depth: number;
  path: Array<string | number>;
}

/** Iterative walk over arrays and objects; returns the first value nested past `maxDepth`. */
export function findNestingViolation(
  value: unknown,
  maxDepth: number,
): NestingViolation | undefined {
  const pending: Array<{ node: unknown } & NestingViolation> = [
    { node: value, depth: 1, path: [] },
  ];

  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const { node, depth, path } = entry;
    if (depth > maxDepth) return { depth, path };

    if (Array.isArray(node)) {
      node.forEach((child: unknown, i) => {
        pending.push({ node: child, depth: depth + 1, path: [...path, i] });
      });
    } else if (isRecord(node)) {
      for (const [key, child] of Object.entries(node)) {
        pending.push({ node: child, depth: depth + 1, path: [...path, key] });
      }
    }
  }
  return undefined;
}

// Issues from a nested safeParse already carry the full path; re-rooted
// under the effect's own path before they're added back.
function reportIssues(issues: z.ZodIssue[], ctx: z.RefinementCtx): never {
  for (const issue of issues) {
    ctx.addIssue({ ...issue, path: issue.path.slice(ctx.path.length), fatal: true });
  }
  return z.NEVER;
}

/**
 * Like `z.record(z.string(), value)`, but keeps every own key of the input.
 * `z.record` silently drops a `__proto__` key that `JSON.parse` creates.
 */
export function ownRecord<T extends z.ZodTypeAny>(value: T) {
  return z.unknown().transform((input, ctx): Record<string, z.output<T>> => {
    if (!isRecord(input)) {
      ctx.addIssue({
        code: "invalid_type",
        expected: "object",
        received: z.getParsedType(input),
        fatal: true,
      });
      return z.NEVER;
    }

    const entries: Array<[string, z.output<T>]> = [];
    for (const [key, item] of Object.entries(input)) {
      const result = value.safeParse(item, { path: [...ctx.path, key] });
      if (!result.success) return reportIssues(result.error.issues, ctx);
      entries.push([key, result.data]);
    }
    return Object.fromEntries(entries);
  });
}

/** Checks nesting iteratively before `schema` recurses into the value. */
export function boundedDepth<T extends z.ZodTypeAny>(schema: T, maxDepth = MAX_JSON_DEPTH) {
  return z.unknown().transform((input, ctx): z.output<T> => {
    const violation = findNestingViolation(input, maxDepth);
    if (violation) {
      const params: DepthIssueParams = {
        kind: "DepthExceeded",
        expected: `at most ${String(maxDepth)} nested levels`,
        actual: `${String(violation.depth)} levels`,
      };
      ctx.addIssue({
        code: "custom",
        message: "nesting too deep",
        path: violation.path,
        params,
        fatal: true,
      });
      return z.NEVER;
    }

    const result = schema.safeParse(input, { path: ctx.path });
    if (!result.success) return reportIssues(result.error.issues, ctx);
    return result.data;
  });
}

const JsonTreeSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonTreeSchema),
    ownRecord(JsonTreeSchema),
  ]),
);

export const JsonValueSchema = boundedDepth(JsonTreeSchema);

export const JsonObjectSchema = boundedDepth(ownRecord(JsonTreeSchema));
