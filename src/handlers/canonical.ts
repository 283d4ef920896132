import type { FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import type { AppContext } from "../context.js";
import { CodecError } from "../errors.js";
import { truncate } from "../logger.js";
import { canonicalize, DOCUMENT_KINDS } from "../canonicalize.js";
import { stringifyCanonical } from "../canonical-json.js";
import { sendError } from "./errors.js";

const CanonicalParamsSchema = z.object({
  kind: z.enum(DOCUMENT_KINDS),
});

export function createCanonicalHandler({ logger, config }: AppContext) {
  const log = logger.child("canonical");

  return function handleCanonical(request: FastifyRequest, reply: FastifyReply): void {
    const params = CanonicalParamsSchema.safeParse(request.params);
    if (!params.success) {
      sendError(reply, 404, {
        message: `Unknown document kind. Expected one of: ${DOCUMENT_KINDS.join(", ")}`,
        type: "invalid_request_error",
        param: "kind",
        code: "not_found",
      });
      return;
    }
    const { kind } = params.data;

    let body: string;
    try {
      body = stringifyCanonical(
        canonicalize(kind, request.body, { maxDepth: config.maxSchemaDepth }),
      );
    } catch (err) {
      if (!(err instanceof CodecError)) throw err;
      log.info(`Rejected ${kind}: ${err.message}`);
      log.debug(`Rejected body: ${truncate(request.body)}`);
      sendError(reply, 400, {
        message: err.message,
        type: "invalid_request_error",
        param: err.path,
        code: err.kind,
      });
      return;
    }

    log.debug(`Canonical ${kind}: ${truncate(body)}`);
    // already serialized; fastify would re-order integer-like keys
    void reply.type("application/json; charset=utf-8").send(body);
  };
}
