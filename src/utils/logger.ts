/**
 * Console logger shared by the generator and the tools.
 *
 * Environment Variables:
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=dca,store,script,cast,boot  (optional, default: every scope)
 *   LOG_FORMAT=pretty|json                 (default: pretty)
 *
 * Example:
 *   LOG_LEVEL=debug LOG_SCOPES=dca  npx tsx src/tools/generate-cues.ts
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";
export type LogScope = "dca" | "store" | "script" | "cast" | "boot" | "config" | string;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  scopes: string[];
  format: LogFormat;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_ABBR: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const rawLevel = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  const rawFormat = (env.LOG_FORMAT ?? "pretty").trim().toLowerCase();
  return {
    level: isLogLevel(rawLevel) ? rawLevel : "info",
    scopes: (env.LOG_SCOPES ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s),
    format: rawFormat === "json" ? "json" : "pretty",
  };
}

export function formatEntry(entry: LogEntry, format: LogFormat): string {
  if (format === "json") {
    return JSON.stringify(entry);
  }

  const time = entry.timestamp.slice(11, 19); // HH:MM:SS
  const scopeStr = entry.scope ? ` │ ${entry.scope}` : "";
  const dataStr = entry.data !== undefined ? ` │ ${JSON.stringify(entry.data)}` : "";
  return `${time} [${LEVEL_ABBR[entry.level]}]${scopeStr} ${entry.message}${dataStr}`;
}

export class Logger {
  private level: number;
  private scopes: Set<string>;
  private format: LogFormat;

  constructor(options: LoggerOptions = loggerOptionsFromEnv()) {
    this.level = LOG_LEVELS[options.level];
    this.scopes = new Set(options.scopes);
    this.format = options.format;
  }

  /** Re-read LOG_LEVEL / LOG_SCOPES / LOG_FORMAT, e.g. after dotenv has loaded. */
  configure(options: LoggerOptions): void {
    this.level = LOG_LEVELS[options.level];
    this.scopes = new Set(options.scopes);
    this.format = options.format;
  }

  private shouldLog(level: LogLevel, scope?: string): boolean {
    if (LOG_LEVELS[level] < this.level) return false;
    // Unscoped messages always pass the scope filter.
    if (this.scopes.size > 0 && scope && !this.scopes.has(scope)) return false;
    return true;
  }

  write(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    if (!this.shouldLog(level, scope)) return;

    const output = formatEntry(
      { timestamp: new Date().toISOString(), level, scope, message, data },
      this.format,
    );

    switch (level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "trace":
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.write("trace", message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.write("debug", message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.write("info", message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.write("warn", message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.write("error", message, scope, data);
  }

  /**
   * Create a logger bound to one scope.
   * Usage: const dcaLog = log.withScope("dca");
   *        dcaLog.debug("message") -> logs with scope="dca"
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

export class ScopedLogger {
  constructor(
    private logger: Logger,
    private scope: LogScope,
  ) {}

  trace(message: string, data?: unknown): void {
    this.logger.trace(message, this.scope, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.scope, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(message, this.scope, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.scope, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.scope, data);
  }
}

export const log = new Logger();
export default log;
