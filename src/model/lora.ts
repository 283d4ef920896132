import { z } from "zod";
import { decodeWith, integer } from "../codec.js";
import type { WirePath } from "../errors.js";
import type { JsonObject } from "../json.js";
import { METADATA_WIRE_KEY } from "./request.js";

/**
 * Adapter selection record carried inside the request's extension block.
 * It is plain data here; whatever loads the adapter lives on the backend
 * side.
 */
export interface LoraRequest {
  loraId: string;
  loraIntId: number;
  loraLocalPath: string;
}

export const LORA_METADATA_KEY = "lora_request";

export const LoraRequestSchema = z
  .object({
    lora_id: z.string(),
    lora_int_id: z.number().int(),
    lora_local_path: z.string(),
  })
  .transform(
    (lora): LoraRequest => ({
      loraId: lora.lora_id,
      loraIntId: lora.lora_int_id,
      loraLocalPath: lora.lora_local_path,
    }),
  );

export function decodeLoraRequest(value: unknown, path: WirePath = []): LoraRequest {
  return decodeWith(LoraRequestSchema, value, path);
}

export function encodeLoraRequest(lora: LoraRequest, path: WirePath = []): JsonObject {
  return {
    lora_id: lora.loraId,
    lora_int_id: integer(lora.loraIntId, [...path, "lora_int_id"]),
    lora_local_path: lora.loraLocalPath,
  };
}

export function loraRequestFromMetadata(
  metadata: JsonObject | undefined,
): LoraRequest | undefined {
  const raw = metadata?.[LORA_METADATA_KEY];
  if (raw === undefined || raw === null) return undefined;
  return decodeLoraRequest(raw, [METADATA_WIRE_KEY, LORA_METADATA_KEY]);
}

/** Returns metadata with the adapter record set, leaving every other key as it was. */
export function withLoraRequest(
  metadata: JsonObject | undefined,
  lora: LoraRequest,
): JsonObject {
  return {
    ...metadata,
    [LORA_METADATA_KEY]: encodeLoraRequest(lora, [METADATA_WIRE_KEY, LORA_METADATA_KEY]),
  };
}
