import type { FastifyReply } from "fastify";
import type { ErrorDetail, ErrorResponse } from "../types.js";

export function sendError(reply: FastifyReply, status: number, detail: ErrorDetail): void {
  const body: ErrorResponse = { error: detail };
  void reply.status(status).send(body);
}
