import { isLogLevel, LEVEL_PRIORITY, type LogLevel } from "./logger.js";
import { DOCUMENT_KINDS, isDocumentKind, type DocumentKind } from "./canonicalize.js";

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port "${value}": expected an integer between 1 and 65535`);
  }
  return port;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(
      `Invalid log level "${value}": expected one of ${Object.keys(LEVEL_PRIORITY).join(", ")}`,
    );
  }
  return value;
}

export function parseDocumentKind(value: string): DocumentKind {
  if (!isDocumentKind(value)) {
    throw new Error(`Invalid kind "${value}": expected one of ${DOCUMENT_KINDS.join(", ")}`);
  }
  return value;
}
