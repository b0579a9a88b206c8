/**
 * Structured logging for the evaluation harness.
 * JSON or pretty console output, scoped child loggers, pluggable sink.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LogContext {
  scope?: string;
  caseId?: string;
  [key: string]: unknown;
}

export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Receives every entry that passes the level filter, along with the line
 * that would have been printed for it.
 */
export type LogSink = (entry: StructuredLogEntry, formatted: string) => void;

export interface LoggerOptions {
  format?: LogFormat;
  minLevel?: LogLevel;
  context?: LogContext;
  sink?: LogSink;
}

export interface Logger {
  trace: (message: string, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  child: (childContext: LogContext) => Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m', // Gray
  debug: '\x1b[36m', // Cyan
  info: '\x1b[34m', // Blue
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET_COLOR = '\x1b[0m';

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export function isLogFormat(value: string | undefined): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

const consoleSink: LogSink = (entry, formatted) => {
  if (entry.level === 'error' || entry.level === 'warn') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
};

function formatPretty(entry: StructuredLogEntry): string {
  const color = LOG_LEVEL_COLORS[entry.level];
  const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);
  const scopeStr = entry.context?.scope ? `[${entry.context.scope}]` : '';

  let output = `${color}${levelStr}${RESET_COLOR} ${scopeStr} ${entry.message}`;

  const contextKeys = Object.keys(entry.context || {}).filter((k) => k !== 'scope');
  if (contextKeys.length > 0) {
    const contextStr = contextKeys.map((k) => `${k}=${String(entry.context?.[k])}`).join(' ');
    output += ` ${contextStr}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n${entry.error.stack.split('\n').slice(1).join('\n')}`;
    }
  }

  return output;
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envFormat = process.env.LOG_FORMAT;
  const envLevel = process.env.LOG_LEVEL;
  const format: LogFormat = options.format || (isLogFormat(envFormat) ? envFormat : 'pretty');
  const minLevel: LogLevel = options.minLevel || (isLogLevel(envLevel) ? envLevel : 'info');
  const baseContext = options.context || {};
  const sink = options.sink || consoleSink;

  const log = (level: LogLevel, message: string, error?: Error, context?: LogContext) => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }

    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...baseContext, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    sink(entry, format === 'json' ? JSON.stringify(entry) : formatPretty(entry));
  };

  return {
    trace: (message, context) => log('trace', message, undefined, context),
    debug: (message, context) => log('debug', message, undefined, context),
    info: (message, context) => log('info', message, undefined, context),
    warn: (message, context) => log('warn', message, undefined, context),
    error: (message, error, context) => log('error', message, error, context),
    child: (childContext) =>
      createLogger({
        ...options,
        context: { ...baseContext, ...childContext },
      }),
  };
}

/**
 * Create a scoped logger (convenience function)
 */
export function createScopedLogger(scope: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return createLogger({
    ...options,
    context: { scope },
  });
}
