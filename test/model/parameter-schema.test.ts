import { describe, it, expect } from "vitest";
import {
  DEFAULT_MAX_SCHEMA_DEPTH,
  decodeParameterSchema,
  encodeParameterSchema,
  findDepthViolation,
  type ParameterSchema,
} from "../../src/model/parameter-schema.js";
import { DecodeError, EncodeError } from "../../src/errors.js";
import { stringifyCanonical } from "../../src/canonical-json.js";
import { codecFailure } from "../helpers.js";

function arrayChain(levels: number): unknown {
  let node: unknown = { type: "string" };
  for (let i = 1; i < levels; i++) {
    node = { type: "array", items: node };
  }
  return node;
}

describe("decodeParameterSchema", () => {
  it("decodes nested properties, required, and items", () => {
    const decoded = decodeParameterSchema({
      type: "object",
      description: "Search arguments",
      properties: {
        query: { type: "string" },
        tags: { type: "array", items: { type: "string", enum_values: ["a", "b"] } },
      },
      required: ["query"],
    });
    expect(decoded).toEqual({
      schemaType: "object",
      description: "Search arguments",
      properties: {
        query: { schemaType: "string" },
        tags: {
          schemaType: "array",
          items: { schemaType: "string", enumValues: ["a", "b"] },
        },
      },
      required: ["query"],
    });
  });

  it("leaves absent optional fields unset rather than empty", () => {
    const decoded = decodeParameterSchema({ type: "object" });
    expect(decoded.properties).toBeUndefined();
    expect(decoded.required).toBeUndefined();
    expect(decoded.enumValues).toBeUndefined();
  });

  it("treats explicit nulls as unset", () => {
    const decoded = decodeParameterSchema({ type: "string", description: null, items: null });
    expect(decoded.description).toBeUndefined();
    expect(decoded.items).toBeUndefined();
  });

  it("keeps items on a non-array node", () => {
    const decoded = decodeParameterSchema({ type: "string", items: { type: "number" } });
    expect(decoded.items).toEqual({ schemaType: "number" });
  });

  it("keeps a property named __proto__", () => {
    const decoded = decodeParameterSchema(
      JSON.parse('{"type":"object","properties":{"__proto__":{"type":"string"},"a":{"type":"number"}}}'),
    );
    const properties = decoded.properties ?? {};
    expect(Object.keys(properties)).toEqual(["__proto__", "a"]);
    expect(Object.getOwnPropertyDescriptor(properties, "__proto__")?.value).toEqual({
      schemaType: "string",
    });
    expect(stringifyCanonical(encodeParameterSchema(decoded))).toBe(
      '{"type":"object","properties":{"__proto__":{"type":"string"},"a":{"type":"number"}}}',
    );
  });

  it("reports a failure under a __proto__ property with its path", () => {
    const err = codecFailure(() =>
      decodeParameterSchema(JSON.parse('{"type":"object","properties":{"__proto__":{"type":"int"}}}')),
    );
    expect(err.kind).toBe("UnknownVariant");
    expect(err.path).toBe("$.properties.__proto__.type");
  });

  it("reports a failure under a nested property with its path", () => {
    const err = codecFailure(() =>
      decodeParameterSchema({ type: "object", properties: { a: { type: "object", properties: { b: {} } } } }),
    );
    expect(err.kind).toBe("MissingField");
    expect(err.path).toBe("$.properties.a.properties.b.type");
  });

  it("reports non-object properties as TypeMismatch", () => {
    const err = codecFailure(() => decodeParameterSchema({ type: "object", properties: ["a"] }));
    expect(err.kind).toBe("TypeMismatch");
    expect(err.path).toBe("$.properties");
  });

  it("reports a missing type as MissingField", () => {
    const err = codecFailure(() => decodeParameterSchema({ description: "no type" }));
    expect(err).toBeInstanceOf(DecodeError);
    expect(err.kind).toBe("MissingField");
    expect(err.path).toBe("$.type");
  });

  it.each(["bogus", "Object", "integer"])("rejects type %j as UnknownVariant", (type) => {
    const err = codecFailure(() => decodeParameterSchema({ type }));
    expect(err.kind).toBe("UnknownVariant");
    expect(err.path).toBe("$.type");
    expect(err.actual).toBe(JSON.stringify(type));
  });

  it("reports failures deep in the tree with their full path", () => {
    const err = codecFailure(() =>
      decodeParameterSchema({
        type: "object",
        properties: { loc: { type: "array", items: { type: "wat" } } },
      }),
    );
    expect(err.kind).toBe("UnknownVariant");
    expect(err.path).toBe("$.properties.loc.items.type");
  });

  it("reports a non-string enum value as TypeMismatch", () => {
    const err = codecFailure(() => decodeParameterSchema({ type: "string", enum_values: ["a", 1] }));
    expect(err.kind).toBe("TypeMismatch");
    expect(err.path).toBe("$.enum_values[1]");
  });

  it("accepts a tree exactly at the default depth ceiling", () => {
    expect(() => decodeParameterSchema(arrayChain(DEFAULT_MAX_SCHEMA_DEPTH))).not.toThrow();
  });

  it("rejects a tree one level past the default ceiling", () => {
    const err = codecFailure(() => decodeParameterSchema(arrayChain(DEFAULT_MAX_SCHEMA_DEPTH + 1)));
    expect(err.kind).toBe("DepthExceeded");
    expect(err.path).toBe("$" + ".items".repeat(DEFAULT_MAX_SCHEMA_DEPTH));
  });

  it("honours a custom depth ceiling", () => {
    const err = codecFailure(() => decodeParameterSchema(arrayChain(4), { maxDepth: 3 }));
    expect(err.kind).toBe("DepthExceeded");
    expect(err.path).toBe("$.items.items.items");
    expect(err.expected).toBe("at most 3 nested levels");
    expect(err.actual).toBe("4 levels");
  });

  it("counts depth through properties", () => {
    const err = codecFailure(() =>
      decodeParameterSchema(
        {
          type: "object",
          properties: { a: { type: "object", properties: { b: { type: "string" } } } },
        },
        { maxDepth: 2 },
      ),
    );
    expect(err.kind).toBe("DepthExceeded");
    expect(err.path).toBe("$.properties.a.properties.b");
  });
});

describe("findDepthViolation", () => {
  it("returns undefined for a shallow tree", () => {
    expect(findDepthViolation(arrayChain(3), 3)).toBeUndefined();
  });

  it("ignores non-object values", () => {
    expect(findDepthViolation("not a schema", 1)).toBeUndefined();
  });
});

describe("encodeParameterSchema", () => {
  it("omits every unset optional field", () => {
    expect(JSON.stringify(encodeParameterSchema({ schemaType: "boolean" }))).toBe(
      '{"type":"boolean"}',
    );
  });

  it("emits properties in ascending key order", () => {
    const schema: ParameterSchema = {
      schemaType: "object",
      properties: {
        zeta: { schemaType: "number" },
        alpha: { schemaType: "string", description: "first" },
        mid: { schemaType: "null" },
      },
      required: ["zeta", "alpha"],
    };
    expect(JSON.stringify(encodeParameterSchema(schema))).toBe(
      '{"type":"object","properties":{"alpha":{"type":"string","description":"first"},"mid":{"type":"null"},"zeta":{"type":"number"}},"required":["zeta","alpha"]}',
    );
  });

  it("orders integer-like property names as strings", () => {
    const decoded = decodeParameterSchema({
      type: "object",
      properties: { b: { type: "string" }, "10": { type: "number" }, "9": { type: "boolean" } },
    });
    expect(stringifyCanonical(encodeParameterSchema(decoded))).toBe(
      '{"type":"object","properties":{"10":{"type":"number"},"9":{"type":"boolean"},"b":{"type":"string"}}}',
    );
  });

  it("gives identical bytes for the same tree built in different orders", () => {
    const forward: ParameterSchema = { schemaType: "object", properties: {} };
    const backward: ParameterSchema = { schemaType: "object", properties: {} };
    const names = ["city", "country", "units", "days"];
    for (const name of names) {
      forward.properties = { ...forward.properties, [name]: { schemaType: "string" } };
    }
    for (const name of [...names].reverse()) {
      backward.properties = { ...backward.properties, [name]: { schemaType: "string" } };
    }
    expect(JSON.stringify(encodeParameterSchema(forward))).toBe(
      JSON.stringify(encodeParameterSchema(backward)),
    );
  });

  it("re-encodes a pre-sorted wire schema byte for byte", () => {
    const wire =
      '{"type":"object","description":"Forecast query","properties":{"city":{"type":"string"},"days":{"type":"array","items":{"type":"number"}},"units":{"type":"string","enum_values":["c","f"]}},"required":["city"]}';
    expect(JSON.stringify(encodeParameterSchema(decodeParameterSchema(JSON.parse(wire))))).toBe(wire);
  });

  it("fails fast on an unknown schema type", () => {
    const bogus: ParameterSchema = JSON.parse(
      '{"schemaType":"object","properties":{"x":{"schemaType":"integer"}}}',
    );
    const err = codecFailure(() => encodeParameterSchema(bogus));
    expect(err).toBeInstanceOf(EncodeError);
    expect(err.kind).toBe("TypeMismatch");
    expect(err.path).toBe("$.properties.x.type");
  });
});
