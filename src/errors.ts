import type { ZodError, ZodIssue } from "zod";
import { DepthIssueParamsSchema, describeJson, isRecord } from "./json.js";

export const CODEC_ERROR_KINDS = [
  "UnexpectedShape",
  "UnknownVariant",
  "MissingField",
  "TypeMismatch",
  "DepthExceeded",
] as const;

export type CodecErrorKind = (typeof CODEC_ERROR_KINDS)[number];

export type WirePath = ReadonlyArray<string | number>;

export function formatPath(path: WirePath): string {
  let out = "$";
  for (const segment of path) {
    out += typeof segment === "number" ? `[${String(segment)}]` : `.${segment}`;
  }
  return out;
}

export class CodecError extends Error {
  readonly kind: CodecErrorKind;
  readonly path: string;
  readonly expected: string;
  readonly actual: string;

  constructor(
    kind: CodecErrorKind,
    path: WirePath,
    expected: string,
    actual: string,
  ) {
    const where = formatPath(path);
    super(`${kind} at ${where}: expected ${expected}, got ${actual}`);
    this.name = "CodecError";
    this.kind = kind;
    this.path = where;
    this.expected = expected;
    this.actual = actual;
  }
}

export class DecodeError extends CodecError {
  override name = "DecodeError";
}

export class EncodeError extends CodecError {
  override name = "EncodeError";
}

function valueAt(root: unknown, path: WirePath): unknown {
  let current = root;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === "number") {
      current = current[segment];
    } else if (isRecord(current) && Object.hasOwn(current, segment)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

function quote(values: readonly unknown[]): string {
  return values.map((v) => JSON.stringify(v)).join(" | ");
}

// a branch whose first failure sits deeper in the document got further
// matching the value, so its failure is the one worth reporting
function rank(issue: ZodIssue): number {
  return issue.path.length * 2 + (issue.code === "invalid_type" ? 0 : 1);
}

function fromUnionIssue(
  issue: Extract<ZodIssue, { code: "invalid_union" }>,
  input: unknown,
  basePath: WirePath,
): DecodeError {
  const candidates = issue.unionErrors.flatMap((e) => e.issues);
  let best: ZodIssue | undefined;
  for (const candidate of candidates) {
    if (!best || rank(candidate) > rank(best)) best = candidate;
  }

  if (best && (best.path.length > issue.path.length || best.code !== "invalid_type")) {
    return fromZodIssue(best, input, basePath);
  }

  const expected = candidates
    .flatMap((c) => (c.code === "invalid_type" ? [c.expected] : []))
    .join(" | ");
  return new DecodeError(
    "UnexpectedShape",
    [...basePath, ...issue.path],
    expected || "one of the accepted shapes",
    describeJson(valueAt(input, issue.path)),
  );
}

export function fromZodIssue(
  issue: ZodIssue,
  input: unknown,
  basePath: WirePath = [],
): DecodeError {
  const path = [...basePath, ...issue.path];
  const actual = valueAt(input, issue.path);

  switch (issue.code) {
    case "invalid_type":
      if (actual === undefined) {
        return new DecodeError("MissingField", path, issue.expected, "nothing");
      }
      return new DecodeError("TypeMismatch", path, issue.expected, issue.received);

    case "invalid_enum_value":
      return new DecodeError(
        "UnknownVariant",
        path,
        quote(issue.options),
        JSON.stringify(issue.received),
      );

    case "invalid_literal":
      return new DecodeError(
        "UnknownVariant",
        path,
        JSON.stringify(issue.expected),
        JSON.stringify(issue.received),
      );

    case "invalid_union_discriminator":
      if (actual === undefined) {
        return new DecodeError("MissingField", path, quote(issue.options), "nothing");
      }
      return new DecodeError(
        "UnknownVariant",
        path,
        quote(issue.options),
        JSON.stringify(actual),
      );

    case "invalid_union":
      if (actual === undefined) {
        return new DecodeError("MissingField", path, "a value", "nothing");
      }
      return fromUnionIssue(issue, input, basePath);

    case "custom": {
      const depth = DepthIssueParamsSchema.safeParse(issue.params);
      if (depth.success) {
        return new DecodeError("DepthExceeded", path, depth.data.expected, depth.data.actual);
      }
      return new DecodeError("TypeMismatch", path, issue.message, describeJson(actual));
    }

    default:
      return new DecodeError("TypeMismatch", path, issue.message, describeJson(actual));
  }
}

export function fromZodError(
  error: ZodError,
  input: unknown,
  basePath: WirePath = [],
): DecodeError {
  const first = error.issues[0];
  if (!first) {
    return new DecodeError("UnexpectedShape", basePath, "a valid document", describeJson(input));
  }
  return fromZodIssue(first, input, basePath);
}
