/**
 * Logging Subsystem
 *
 * Structured, levelled logging with subsystems and pluggable transports.
 * Console output goes to stderr so rendered data on stdout stays clean.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  subscriptionId?: string;
  resourceGroup?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogContext = {
  subscriptionId?: string;
  resourceGroup?: string;
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.subscriptionId) contextParts.push(`subscription=${entry.subscriptionId}`);
    if (entry.resourceGroup) contextParts.push(`resourceGroup=${entry.resourceGroup}`);
    if (contextParts.length > 0) parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private stream: { write(chunk: string): unknown };

  constructor(options?: { formatter?: LogFormatter; stream?: { write(chunk: string): unknown } }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.stream = options?.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    this.stream.write(`${this.formatter(entry)}\n`);
  }
}

/** Keeps entries in memory; used by tests to assert on what was logged. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class StructuredLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return new StructuredLogger({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): Logger {
    return new StructuredLogger({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta,
      subscriptionId: this.context.subscriptionId,
      resourceGroup: this.context.resourceGroup,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createLogger(
  subsystem: string,
  options?: { level?: LogLevel; transports?: LogTransport[] },
): Logger {
  return new StructuredLogger({
    subsystem,
    level: options?.level ?? "info",
    transports: options?.transports,
  });
}

/** A logger that drops everything; the default for library callers. */
export function createSilentLogger(): Logger {
  return new StructuredLogger({ subsystem: "silent", level: "fatal", transports: [] });
}
