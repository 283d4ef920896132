import { z } from "zod";
import { checkJson, compact, oneOf, optional } from "../codec.js";
import type { WirePath } from "../errors.js";
import { JsonValueSchema, type JsonObject, type JsonValue } from "../json.js";

export const TOOL_KINDS = ["function"] as const;

export type ToolKind = (typeof TOOL_KINDS)[number];

export interface FunctionDeclaration {
  name: string;
  description?: string | undefined;
  /** Opaque JSON; use `encodeParameterSchema` to fill it from a typed schema. */
  parameters: JsonValue;
}

export interface ToolDeclaration {
  kind: ToolKind;
  function: FunctionDeclaration;
}

export interface ToolCallFunction {
  name?: string | undefined;
  arguments?: string | undefined;
}

export interface ToolCall {
  id: string;
  type: string;
  function: ToolCallFunction;
}

export function functionTool(fn: FunctionDeclaration): ToolDeclaration {
  return { kind: "function", function: fn };
}

export const FunctionDeclarationSchema = z
  .object({
    name: z.string(),
    description: optional(z.string()),
    parameters: JsonValueSchema,
  })
  .transform(
    (fn): FunctionDeclaration => ({
      name: fn.name,
      description: fn.description,
      parameters: fn.parameters,
    }),
  );

export const ToolDeclarationSchema = z
  .object({
    type: z.enum(TOOL_KINDS),
    function: FunctionDeclarationSchema,
  })
  .transform((tool): ToolDeclaration => ({ kind: tool.type, function: tool.function }));

export const ToolCallFunctionSchema = z.object({
  name: optional(z.string()),
  arguments: optional(z.string()),
});

export const ToolCallSchema = z.object({
  id: z.string(),
  type: z.string(),
  function: ToolCallFunctionSchema,
});

export function encodeFunctionDeclaration(
  fn: FunctionDeclaration,
  path: WirePath = [],
): JsonObject {
  return compact({
    name: fn.name,
    description: fn.description,
    parameters: checkJson(fn.parameters, [...path, "parameters"]),
  });
}

export function encodeToolDeclaration(
  tool: ToolDeclaration,
  path: WirePath = [],
): JsonObject {
  return {
    type: oneOf(TOOL_KINDS, tool.kind, [...path, "type"]),
    function: encodeFunctionDeclaration(tool.function, [...path, "function"]),
  };
}

export function encodeToolCallFunction(fn: ToolCallFunction): JsonObject {
  return compact({ name: fn.name, arguments: fn.arguments });
}

export function encodeToolCall(call: ToolCall): JsonObject {
  return {
    id: call.id,
    type: call.type,
    function: encodeToolCallFunction(call.function),
  };
}
