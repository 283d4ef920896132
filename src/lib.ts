export * from "./model/index.js";
export * from "./json.js";
export {
  CODEC_ERROR_KINDS,
  CodecError,
  DecodeError,
  EncodeError,
  formatPath,
  type CodecErrorKind,
  type WirePath,
} from "./errors.js";
export { stringifyCanonical } from "./canonical-json.js";
export { canonicalize, DOCUMENT_KINDS, type DocumentKind } from "./canonicalize.js";
