import type { CodecErrorKind } from "./errors.js";

/** OpenAI-style error body, used for every non-200 reply. */
export interface ErrorDetail {
  message: string;
  type: "invalid_request_error";
  param: string | null;
  code: CodecErrorKind | "not_found";
}

export interface ErrorResponse {
  error: ErrorDetail;
}
