export const LEVEL_PRIORITY = {
  none: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4,
  all: 5,
} as const;

export type LogLevel = keyof typeof LEVEL_PRIORITY;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

export function truncate(value: unknown, maxLen = 200): string {
  const s = typeof value === "string" ? value : JSON.stringify(value);
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + "…";
}

export class Logger {
  readonly level: LogLevel;
  readonly scope: string | undefined;
  private threshold: number;

  constructor(level: LogLevel = "info", scope?: string) {
    this.level = level;
    this.scope = scope;
    this.threshold = LEVEL_PRIORITY[level];
  }

  /** Same level, messages tagged with `scope` (nested scopes join with ":"). */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private format(tag: string, msg: string): string {
    return this.scope ? `[${tag}] [${this.scope}] ${msg}` : `[${tag}] ${msg}`;
  }

  error(msg: string, ...args: unknown[]): void {
    if (this.threshold >= LEVEL_PRIORITY.error) {
      console.error(this.format("ERROR", msg), ...args);
    }
  }

  warn(msg: string, ...args: unknown[]): void {
    if (this.threshold >= LEVEL_PRIORITY.warning) {
      console.warn(this.format("WARN", msg), ...args);
    }
  }

  info(msg: string, ...args: unknown[]): void {
    if (this.threshold >= LEVEL_PRIORITY.info) {
      console.log(this.format("INFO", msg), ...args);
    }
  }

  debug(msg: string, ...args: unknown[]): void {
    if (this.threshold >= LEVEL_PRIORITY.debug) {
      console.log(this.format("DEBUG", msg), ...args);
    }
  }
}
