import { z } from "zod";
import { checkJson, compact, decodeWith, finite, integer, optional } from "../codec.js";
import type { WirePath } from "../errors.js";
import {
  JsonObjectSchema,
  JsonValueSchema,
  type JsonObject,
  type JsonValue,
} from "../json.js";
import { MessageSchema, encodeMessage, type Message } from "./message.js";
import { ToolChoiceSchema, encodeToolChoice, type ToolChoice } from "./tool-choice.js";
import { ToolDeclarationSchema, encodeToolDeclaration, type ToolDeclaration } from "./tool.js";

export interface ChatRequest {
  model: string;
  /** Conversation order. May be empty; non-emptiness is the caller's concern. */
  messages: Message[];
  temperature?: number | undefined;
  topP?: number | undefined;
  n?: number | undefined;
  responseFormat?: JsonValue | undefined;
  stream?: boolean | undefined;
  stop?: string[] | undefined;
  maxTokens?: number | undefined;
  presencePenalty?: number | undefined;
  frequencyPenalty?: number | undefined;
  logitBias?: Record<string, number> | undefined;
  user?: string | undefined;
  seed?: number | undefined;
  tools?: ToolDeclaration[] | undefined;
  toolChoice?: ToolChoice | undefined;
  prettifyTools?: boolean | undefined;
  structureOutputDecodingMode?: string | undefined;
  useRawOutput?: boolean | undefined;
  includeThinking?: boolean | undefined;
  /** Backend-specific extensions under {@link METADATA_WIRE_KEY}, passed through untouched. */
  backendMetadata?: JsonObject | undefined;
}

/** Wire key of the opaque extension block. */
export const METADATA_WIRE_KEY = "empower_metadata";

export type ChatRequestOption = Exclude<keyof ChatRequest, "model" | "messages">;

export function createChatRequest(model: string, messages: Message[]): ChatRequest {
  return { model, messages };
}

/**
 * Returns a copy of `request` with one optional field replaced. No
 * validation happens here: a `toolChoice` naming a tool that isn't in
 * `tools` is accepted.
 */
export function withOption<K extends ChatRequestOption>(
  request: ChatRequest,
  key: K,
  value: ChatRequest[K],
): ChatRequest {
  return { ...request, [key]: value };
}

export const ChatRequestSchema = z
  .object({
    model: z.string(),
    messages: z.array(MessageSchema),
    temperature: optional(z.number()),
    top_p: optional(z.number()),
    n: optional(z.number().int()),
    response_format: optional(JsonValueSchema),
    stream: optional(z.boolean()),
    stop: optional(z.array(z.string())),
    max_tokens: optional(z.number().int()),
    presence_penalty: optional(z.number()),
    frequency_penalty: optional(z.number()),
    logit_bias: optional(z.record(z.string(), z.number().int())),
    user: optional(z.string()),
    seed: optional(z.number().int()),
    tools: optional(z.array(ToolDeclarationSchema)),
    tool_choice: optional(ToolChoiceSchema),
    prettify_tools: optional(z.boolean()),
    structure_output_decoding_mode: optional(z.string()),
    use_raw_output: optional(z.boolean()),
    include_thinking: optional(z.boolean()),
    [METADATA_WIRE_KEY]: optional(JsonObjectSchema),
  })
  .transform(
    (req): ChatRequest => ({
      model: req.model,
      messages: req.messages,
      temperature: req.temperature,
      topP: req.top_p,
      n: req.n,
      responseFormat: req.response_format,
      stream: req.stream,
      stop: req.stop,
      maxTokens: req.max_tokens,
      presencePenalty: req.presence_penalty,
      frequencyPenalty: req.frequency_penalty,
      logitBias: req.logit_bias,
      user: req.user,
      seed: req.seed,
      tools: req.tools,
      toolChoice: req.tool_choice,
      prettifyTools: req.prettify_tools,
      structureOutputDecodingMode: req.structure_output_decoding_mode,
      useRawOutput: req.use_raw_output,
      includeThinking: req.include_thinking,
      backendMetadata: req[METADATA_WIRE_KEY],
    }),
  );

export function decodeChatRequest(value: unknown): ChatRequest {
  return decodeWith(ChatRequestSchema, value);
}

function optionalNumber(
  value: number | undefined,
  path: WirePath,
  check: (v: number, p: WirePath) => number = finite,
): number | undefined {
  return value === undefined ? undefined : check(value, path);
}

function encodeLogitBias(bias: Record<string, number>): JsonObject {
  const out: JsonObject = {};
  for (const [token, weight] of Object.entries(bias)) {
    out[token] = integer(weight, ["logit_bias", token]);
  }
  return out;
}

/**
 * Encodes a request. `model` and `messages` are always present (an empty
 * conversation is `"messages":[]`); every other field appears only when set.
 */
export function encodeChatRequest(request: ChatRequest): JsonObject {
  return compact({
    model: request.model,
    messages: request.messages.map((message, i) => encodeMessage(message, ["messages", i])),
    temperature: optionalNumber(request.temperature, ["temperature"]),
    top_p: optionalNumber(request.topP, ["top_p"]),
    n: optionalNumber(request.n, ["n"], integer),
    response_format:
      request.responseFormat === undefined
        ? undefined
        : checkJson(request.responseFormat, ["response_format"]),
    stream: request.stream,
    stop: request.stop,
    max_tokens: optionalNumber(request.maxTokens, ["max_tokens"], integer),
    presence_penalty: optionalNumber(request.presencePenalty, ["presence_penalty"]),
    frequency_penalty: optionalNumber(request.frequencyPenalty, ["frequency_penalty"]),
    logit_bias: request.logitBias && encodeLogitBias(request.logitBias),
    user: request.user,
    seed: optionalNumber(request.seed, ["seed"], integer),
    tools: request.tools?.map((tool, i) => encodeToolDeclaration(tool, ["tools", i])),
    tool_choice: request.toolChoice && encodeToolChoice(request.toolChoice, ["tool_choice"]),
    prettify_tools: request.prettifyTools,
    structure_output_decoding_mode: request.structureOutputDecodingMode,
    use_raw_output: request.useRawOutput,
    include_thinking: request.includeThinking,
    [METADATA_WIRE_KEY]:
      request.backendMetadata === undefined
        ? undefined
        : checkJson(request.backendMetadata, [METADATA_WIRE_KEY]),
  });
}
