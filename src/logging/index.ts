// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Request Correlation
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type LogLevel } from '../config/index.js';

export type { LogLevel } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  component?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  requestId?: string;
  component?: string;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  json?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const SENSITIVE_KEY_FRAGMENTS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization', 'cookie'];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment));
}

export function redactObject(obj: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (Array.isArray(obj)) {
    return obj.map((item) => redactObject(item, depth + 1));
  }

  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = isSensitiveKey(key) ? '[REDACTED]' : redactObject(value, depth + 1);
    }
    return result;
  }

  return obj;
}

function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = isSensitiveKey(key) ? '[REDACTED]' : redactObject(value, 1);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private readonly context: LogContext;
  private readonly options: LoggerOptions;

  /**
   * Level and format not given in `options` are read from config on each
   * call, so creating a logger at import time does not load config.
   */
  constructor(context: LogContext = {}, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;
  }

  get level(): LogLevel {
    return this.options.minLevel ?? loadConfig().logging.level;
  }

  private get jsonFormat(): boolean {
    return this.options.json ?? loadConfig().logging.json;
  }

  isEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private formatEntry(level: LogLevel, message: string, extra: Partial<LogEntry>): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
    };

    if (extra.duration !== undefined) entry.duration = extra.duration;
    if (extra.error) entry.error = extra.error;
    if (extra.metadata && Object.keys(extra.metadata).length > 0) {
      entry.metadata = redactMetadata(extra.metadata);
    }

    return entry;
  }

  private output(entry: LogEntry): void {
    const write = entry.level === 'error' || entry.level === 'fatal' ? console.error : console.log;

    if (this.jsonFormat) {
      write(JSON.stringify(entry));
      return;
    }

    const prefix = entry.requestId ? `[${entry.requestId.slice(0, 8)}]` : '';
    const component = entry.component ? `[${entry.component}]` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';

    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[36m',
      info: '\x1b[32m',
      warn: '\x1b[33m',
      error: '\x1b[31m',
      fatal: '\x1b[35m',
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    write(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} ${prefix}${component} ${entry.message}${duration}`
    );

    if (entry.metadata) {
      write('  ', JSON.stringify(entry.metadata));
    }

    if (entry.error) {
      write(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        write('  ', entry.error.stack.split('\n').slice(1, 4).join('\n  '));
      }
    }
  }

  private log(level: LogLevel, message: string, extra: Partial<LogEntry> = {}): void {
    if (!this.isEnabled(level)) return;
    this.output(this.formatEntry(level, message, extra));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, { metadata, error: error ? serializeError(error) : undefined });
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, { metadata, error: error ? serializeError(error) : undefined });
  }

  // Request timing
  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    this.log('info', message, { duration: Date.now() - startTime, metadata });
  }

  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context }, this.options);
  }
}

function serializeError(error: Error): NonNullable<LogEntry['error']> {
  return { name: error.name, message: error.message, stack: error.stack };
}

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST LOGGER (for HTTP requests)
// ─────────────────────────────────────────────────────────────────────────────────

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  requestId: string;
  userAgent?: string;
  error?: Error;
}

export function logRequest(data: RequestLogData): void {
  const logger = loggers.http().child({ requestId: data.requestId });

  const message = `${data.method} ${data.path} ${data.statusCode}`;
  const metadata = { userAgent: data.userAgent };

  if (data.statusCode >= 500) {
    logger.error(message, data.error, { ...metadata, duration: data.duration });
  } else if (data.statusCode >= 400) {
    logger.warn(message, { ...metadata, duration: data.duration });
  } else {
    logger.time(message, Date.now() - data.duration, metadata);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}

// Component-specific loggers
export const loggers = {
  http: () => getLogger({ component: 'http' }),
  engine: () => getLogger({ component: 'engine' }),
  data: () => getLogger({ component: 'data' }),
};
