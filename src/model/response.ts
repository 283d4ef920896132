import { z } from "zod";
import { decodeWith, integer, oneOf, optional } from "../codec.js";
import type { WirePath } from "../errors.js";
import type { JsonObject } from "../json.js";
import {
  ResponseMessageSchema,
  encodeResponseMessage,
  type ResponseMessage,
} from "./message.js";

// "null" is a tag of its own, distinct from a JSON null (which means unset)
export const FINISH_REASONS = [
  "stop",
  "length",
  "content_filter",
  "tool_calls",
  "null",
] as const;

export type FinishReason = (typeof FINISH_REASONS)[number];

export interface FinishDetails {
  type: FinishReason;
  stop: string;
}

export interface Choice {
  index: number;
  message: ResponseMessage;
  finishReason?: FinishReason | undefined;
  finishDetails?: FinishDetails | undefined;
}

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatResponse {
  id: string;
  model: string;
  choices: Choice[];
  usage: Usage;
  systemFingerprint?: string | undefined;
}

const FinishReasonSchema = z.enum(FINISH_REASONS);

export const UsageSchema = z
  .object({
    prompt_tokens: z.number().int(),
    completion_tokens: z.number().int(),
    total_tokens: z.number().int(),
  })
  .transform(
    (usage): Usage => ({
      promptTokens: usage.prompt_tokens,
      completionTokens: usage.completion_tokens,
      totalTokens: usage.total_tokens,
    }),
  );

export const ChoiceSchema = z
  .object({
    index: z.number().int(),
    message: ResponseMessageSchema,
    finish_reason: optional(FinishReasonSchema),
    finish_details: optional(z.object({ type: FinishReasonSchema, stop: z.string() })),
  })
  .transform(
    (choice): Choice => ({
      index: choice.index,
      message: choice.message,
      finishReason: choice.finish_reason,
      finishDetails: choice.finish_details,
    }),
  );

export const ChatResponseSchema = z
  .object({
    id: z.string(),
    model: z.string(),
    choices: z.array(ChoiceSchema),
    usage: UsageSchema,
    system_fingerprint: optional(z.string()),
  })
  .transform(
    (res): ChatResponse => ({
      id: res.id,
      model: res.model,
      choices: res.choices,
      usage: res.usage,
      systemFingerprint: res.system_fingerprint,
    }),
  );

/** Decodes a whole response document; a missing required field fails with `MissingField`. */
export function decodeChatResponse(value: unknown): ChatResponse {
  return decodeWith(ChatResponseSchema, value);
}

function encodeUsage(usage: Usage, path: WirePath): JsonObject {
  return {
    prompt_tokens: integer(usage.promptTokens, [...path, "prompt_tokens"]),
    completion_tokens: integer(usage.completionTokens, [...path, "completion_tokens"]),
    total_tokens: integer(usage.totalTokens, [...path, "total_tokens"]),
  };
}

function encodeChoice(choice: Choice, path: WirePath): JsonObject {
  const details = choice.finishDetails;
  return {
    index: integer(choice.index, [...path, "index"]),
    message: encodeResponseMessage(choice.message, [...path, "message"]),
    finish_reason:
      choice.finishReason === undefined
        ? null
        : oneOf(FINISH_REASONS, choice.finishReason, [...path, "finish_reason"]),
    finish_details: details
      ? {
          type: oneOf(FINISH_REASONS, details.type, [...path, "finish_details", "type"]),
          stop: details.stop,
        }
      : null,
  };
}

// Unset response fields are written as null, the way backends send them.
export function encodeChatResponse(response: ChatResponse): JsonObject {
  return {
    id: response.id,
    model: response.model,
    choices: response.choices.map((choice, i) => encodeChoice(choice, ["choices", i])),
    usage: encodeUsage(response.usage, ["usage"]),
    system_fingerprint: response.systemFingerprint ?? null,
  };
}
