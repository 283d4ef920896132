import { z } from "zod";
import { decodeWith, unrepresentable } from "../codec.js";
import type { WirePath } from "../errors.js";
import type { JsonValue } from "../json.js";
import { ToolDeclarationSchema, encodeToolDeclaration, type ToolDeclaration } from "./tool.js";

export const TOOL_CHOICE_MODES = ["none", "auto", "any"] as const;

export type ToolChoiceMode = (typeof TOOL_CHOICE_MODES)[number];

export type ToolChoice =
  | { kind: "none" }
  | { kind: "auto" }
  | { kind: "any" }
  | { kind: "selected"; tool: ToolDeclaration };

export function selectTool(tool: ToolDeclaration): ToolChoice {
  return { kind: "selected", tool };
}

// Mode strings match exactly; "None" or "AUTO" are unknown variants.
export const ToolChoiceSchema = z.union([
  z.enum(TOOL_CHOICE_MODES).transform((kind): ToolChoice => ({ kind })),
  ToolDeclarationSchema.transform(selectTool),
]);

export function decodeToolChoice(value: unknown, path: WirePath = []): ToolChoice {
  return decodeWith(ToolChoiceSchema, value, path);
}

/**
 * Modes encode as bare strings. A selected tool encodes as the tool's own
 * `{type, function}` object, one level flatter than the in-memory shape:
 * there is no `tool` key on the wire.
 */
export function encodeToolChoice(choice: ToolChoice, path: WirePath = []): JsonValue {
  switch (choice.kind) {
    case "none":
    case "auto":
    case "any":
      return choice.kind;
    case "selected":
      return encodeToolDeclaration(choice.tool, path);
    default:
      return unrepresentable(choice, path, '"none" | "auto" | "any" | tool object');
  }
}
