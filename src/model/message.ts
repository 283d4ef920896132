import { z } from "zod";
import { compact, oneOf, optional } from "../codec.js";
import type { WirePath } from "../errors.js";
import type { JsonObject } from "../json.js";
import { ContentSchema, encodeContent, plainText, type Content } from "./content.js";
import {
  ToolCallFunctionSchema,
  ToolCallSchema,
  encodeToolCall,
  encodeToolCallFunction,
  type ToolCall,
  type ToolCallFunction,
} from "./tool.js";

export const MESSAGE_ROLES = ["user", "system", "assistant", "function", "tool"] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const MessageRoleSchema = z.enum(MESSAGE_ROLES);

export interface Message {
  role: MessageRole;
  content?: Content | undefined;
  toolCalls?: ToolCall[] | undefined;
  toolCallId?: string | undefined;
}

/** The assistant turn as a backend returns it: content is always plain text. */
export interface ResponseMessage {
  role: MessageRole;
  content?: string | undefined;
  name?: string | undefined;
  functionCall?: ToolCallFunction | undefined;
  toolCalls?: ToolCall[] | undefined;
}

export function userMessage(content: Content | string): Message {
  return {
    role: "user",
    content: typeof content === "string" ? plainText(content) : content,
  };
}

export function systemMessage(text: string): Message {
  return { role: "system", content: plainText(text) };
}

export function toolResultMessage(toolCallId: string, text: string): Message {
  return { role: "tool", content: plainText(text), toolCallId };
}

export const MessageSchema = z
  .object({
    role: MessageRoleSchema,
    content: optional(ContentSchema),
    tool_calls: optional(z.array(ToolCallSchema)),
    tool_call_id: optional(z.string()),
  })
  .transform(
    (msg): Message => ({
      role: msg.role,
      content: msg.content,
      toolCalls: msg.tool_calls,
      toolCallId: msg.tool_call_id,
    }),
  );

export const ResponseMessageSchema = z
  .object({
    role: MessageRoleSchema,
    content: optional(z.string()),
    name: optional(z.string()),
    function_call: optional(ToolCallFunctionSchema),
    tool_calls: optional(z.array(ToolCallSchema)),
  })
  .transform(
    (msg): ResponseMessage => ({
      role: msg.role,
      content: msg.content,
      name: msg.name,
      functionCall: msg.function_call,
      toolCalls: msg.tool_calls,
    }),
  );

// unset content is written as null, never dropped
export function encodeMessage(message: Message, path: WirePath = []): JsonObject {
  return compact({
    role: oneOf(MESSAGE_ROLES, message.role, [...path, "role"]),
    content: message.content ? encodeContent(message.content, [...path, "content"]) : null,
    tool_calls: message.toolCalls?.map(encodeToolCall),
    tool_call_id: message.toolCallId,
  });
}

export function encodeResponseMessage(
  message: ResponseMessage,
  path: WirePath = [],
): JsonObject {
  return compact({
    role: oneOf(MESSAGE_ROLES, message.role, [...path, "role"]),
    content: message.content,
    name: message.name,
    function_call: message.functionCall && encodeToolCallFunction(message.functionCall),
    tool_calls: message.toolCalls?.map(encodeToolCall),
  });
}
