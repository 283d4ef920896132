import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import type { AppContext } from "./context.js";
import type { LogLevel } from "./logger.js";
import { createCanonicalHandler } from "./handlers/canonical.js";
import { sendError } from "./handlers/errors.js";

const PINO_LEVEL: Record<LogLevel, string> = {
  none: "silent",
  error: "error",
  warning: "warn",
  info: "info",
  debug: "debug",
  all: "trace",
};

export async function createServer(ctx: AppContext): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: ctx.config.bodyLimit,
    logger: {
      level: PINO_LEVEL[ctx.logger.level],
    },
  });

  await app.register(cors, {
    origin: "*",
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  app.post("/v1/canonical/:kind", createCanonicalHandler(ctx));

  // Anything else gets the same envelope as a rejected document.
  app.setNotFoundHandler((request, reply) => {
    ctx.logger.debug(`No route for ${request.method} ${request.url}`);
    sendError(reply, 404, {
      message: `No route for ${request.method} ${request.url}`,
      type: "invalid_request_error",
      param: null,
      code: "not_found",
    });
  });

  return app;
}
