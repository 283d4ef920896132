#!/usr/bin/env node
import { join, dirname } from "node:path";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { Command } from "commander";
import { loadConfig, resolveConfigPath } from "./config.js";
import { createServer } from "./server.js";
import { Logger } from "./logger.js";
import { canonicalize } from "./canonicalize.js";
import { stringifyCanonical } from "./canonical-json.js";
import { CodecError } from "./errors.js";
import { parseDocumentKind, parseLogLevel, parsePort } from "./cli-validators.js";
import type { AppContext } from "./context.js";

const PACKAGE_ROOT = dirname(import.meta.dirname);
const DEFAULT_CONFIG_PATH = join(PACKAGE_ROOT, "config.json5");

interface CommonOptions {
  logLevel: string;
  config?: string;
}

interface CanonicalizeOptions extends CommonOptions {
  kind: string;
}

interface ServeOptions extends CommonOptions {
  port: string;
}

async function setup(options: CommonOptions): Promise<AppContext> {
  const logger = new Logger(parseLogLevel(options.logLevel));
  const configPath = resolveConfigPath(options.config, process.cwd(), DEFAULT_CONFIG_PATH);
  const config = await loadConfig(configPath, logger);
  logger.debug(`Config loaded from ${configPath}`);
  return { logger, config };
}

async function canonicalizeCommand(file: string, options: CanonicalizeOptions): Promise<void> {
  const kind = parseDocumentKind(options.kind);
  const { logger, config } = await setup(options);

  let document: unknown;
  try {
    document = JSON.parse(await readFile(file, "utf-8"));
  } catch (err) {
    logger.error(`Could not read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
    return;
  }

  try {
    const encoded = canonicalize(kind, document, { maxDepth: config.maxSchemaDepth });
    process.stdout.write(stringifyCanonical(encoded, config.prettyPrint ? 2 : 0) + "\n");
  } catch (err) {
    if (!(err instanceof CodecError)) throw err;
    logger.error(`${file}: ${err.message}`);
    process.exitCode = 1;
  }
}

async function serveCommand(options: ServeOptions): Promise<void> {
  const port = parsePort(options.port);
  const ctx = await setup(options);
  const { logger } = ctx;

  const app = await createServer(ctx);
  await app.listen({ port, host: "127.0.0.1" });
  logger.info(`Listening on http://localhost:${String(port)}`);

  const shutdown = async (signal: string) => {
    logger.info(`Got ${signal}, shutting down...`);
    await app.close();
    logger.info("Clean shutdown complete");
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error("Shutdown error:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", () => { onSignal("SIGINT"); });
  process.on("SIGTERM", () => { onSignal("SIGTERM"); });
}

// Can't use JSON import because rootDir is src/ and package.json is at the project root.
const { version } = z.object({ version: z.string() }).parse(
  JSON.parse(await readFile(join(PACKAGE_ROOT, "package.json"), "utf-8")),
);

const program = new Command()
  .name("chat-wire")
  .description("Canonical encoder and validator for chat-completion wire documents")
  .version(version, "-v, --version");

program
  .command("canonicalize")
  .description("Decode a JSON document and print its canonical encoding")
  .argument("<file>", "path to a JSON document")
  .option("-k, --kind <kind>", "document kind: request, response, schema", "request")
  .option("-l, --log-level <level>", "log verbosity", "info")
  .option("-c, --config <path>", "path to config file")
  .action((file: string, options: CanonicalizeOptions) => canonicalizeCommand(file, options));

program
  .command("serve")
  .description("Start the local validation server")
  .option("-p, --port <number>", "port to listen on", "8080")
  .option("-l, --log-level <level>", "log verbosity", "info")
  .option("-c, --config <path>", "path to config file")
  .action((options: ServeOptions) => serveCommand(options));

program.parseAsync().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
