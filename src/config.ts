import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import JSON5 from "json5";
import { DEFAULT_MAX_SCHEMA_DEPTH } from "./model/parameter-schema.js";
import type { Logger } from "./logger.js";

export const CONFIG_FILENAME = "chat-wire.config.json5";

const ServerConfigSchema = z.object({
  maxSchemaDepth: z.number().int().min(1).max(256).default(DEFAULT_MAX_SCHEMA_DEPTH),
  bodyLimit: z.number().int().positive().default(4 * 1024 * 1024),
  prettyPrint: z.boolean().default(false),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const DEFAULT_CONFIG: ServerConfig = ServerConfigSchema.parse({});

/** `--config` wins, then a config file in the working directory, then the packaged default. */
export function resolveConfigPath(
  explicit: string | undefined,
  cwd: string,
  defaultPath: string,
): string {
  if (explicit) return explicit;
  const local = join(cwd, CONFIG_FILENAME);
  return existsSync(local) ? local : defaultPath;
}

export function parseConfig(raw: unknown, source: string): ServerConfig {
  const result = ServerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join(".") || "(root)";
    throw new Error(`Invalid config in ${source}: ${key}: ${issue?.message ?? "invalid value"}`);
  }
  return result.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadConfig(path: string, logger: Logger): Promise<ServerConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.warn(`No config at ${path}, using defaults`);
      return DEFAULT_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (err) {
    throw new Error(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw, path);
}
