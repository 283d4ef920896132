import type { JsonObject } from "./json.js";
import { decodeChatRequest, encodeChatRequest } from "./model/request.js";
import { decodeChatResponse, encodeChatResponse } from "./model/response.js";
import {
  decodeParameterSchema,
  encodeParameterSchema,
  type SchemaDecodeOptions,
} from "./model/parameter-schema.js";

export const DOCUMENT_KINDS = ["request", "response", "schema"] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export function isDocumentKind(value: string): value is DocumentKind {
  return DOCUMENT_KINDS.some((kind) => kind === value);
}

/**
 * Decodes a parsed JSON document of the given kind and encodes it back.
 * Throws a `CodecError` when the document doesn't decode.
 */
export function canonicalize(
  kind: DocumentKind,
  document: unknown,
  options: SchemaDecodeOptions = {},
): JsonObject {
  switch (kind) {
    case "request":
      return encodeChatRequest(decodeChatRequest(document));
    case "response":
      return encodeChatResponse(decodeChatResponse(document));
    case "schema":
      return encodeParameterSchema(decodeParameterSchema(document, options));
  }
}
