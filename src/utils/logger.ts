import { isJsonScopeError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: number;
    message: string;
    stack?: string;
  };
}

/** Receives formatted output; defaults to the console. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
  includeTimestamp: boolean;
  structuredOutput: boolean;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: "[jsonscope]",
  minLevel: "info",
  includeTimestamp: false,
  structuredOutput: false,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LOG_LEVELS;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

/**
 * Structured logger shared by every jsonscope component.
 */
class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(this.config.prefix);
    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      const contextStr = Object.entries(context)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(" ");
      parts.push(`| ${contextStr}`);
    }

    if (isJsonScopeError(error)) {
      parts.push(`| ${error.toLogMessage()}`);
    } else if (error instanceof Error) {
      parts.push(`| ${error.name}: ${error.message}`);
    }

    return parts.join(" ");
  }

  private createEntry(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    if (context) {
      entry.context = context;
    }

    if (isJsonScopeError(error)) {
      entry.error = {
        name: error.name,
        code: error.code,
        message: error.message,
        stack: error.stack,
      };
    } else if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    const sink = this.config.sink ?? consoleSink;
    const line = this.config.structuredOutput
      ? JSON.stringify(this.createEntry(level, message, context, error))
      : this.formatMessage(level, message, context, error);
    sink(level, line);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("warn", message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("error", message, context, error);
  }

  /**
   * Create a child logger with additional context.
   */
  child(additionalContext: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this, additionalContext);
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): Readonly<LoggerConfig> {
    return this.config;
  }
}

/**
 * Logger with persistent context (per component, per document).
 */
export class ContextualLogger {
  constructor(
    private parent: Logger,
    private context: Record<string, unknown>
  ) {}

  debug(message: string, additionalContext?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.context, ...additionalContext });
  }

  info(message: string, additionalContext?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.context, ...additionalContext });
  }

  warn(message: string, additionalContext?: Record<string, unknown>, error?: unknown): void {
    this.parent.warn(message, { ...this.context, ...additionalContext }, error);
  }

  error(message: string, additionalContext?: Record<string, unknown>, error?: unknown): void {
    this.parent.error(message, { ...this.context, ...additionalContext }, error);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.parent.isLevelEnabled(level);
  }

  child(additionalContext: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this.parent, { ...this.context, ...additionalContext });
  }
}

// Singleton instance
export const logger = new Logger();

export function createLogger(context: Record<string, unknown>): ContextualLogger {
  return logger.child(context);
}

// Configure based on environment
if (typeof process !== "undefined" && process.env) {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    logger.configure({ minLevel: envLevel });
  }
  if (process.env.JSONSCOPE_STRUCTURED_LOGS === "true") {
    logger.configure({ structuredOutput: true });
  }
}
