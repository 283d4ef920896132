import type { ServerConfig } from "./config.js";
import type { Logger } from "./logger.js";

export interface AppContext {
  logger: Logger;
  config: ServerConfig;
}
