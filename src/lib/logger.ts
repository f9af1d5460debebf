/**
 * DealScout — Logger
 *
 * Simple structured logging utility.
 * Human-readable lines in development, JSON lines in production.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// Level from environment, default 'info'; the CLI may override after config load
const envLevel = process.env.LOG_LEVEL;
let currentLevelNum = isLogLevel(envLevel) ? LOG_LEVELS[envLevel] : LOG_LEVELS.info;

/**
 * Change the minimum level at runtime.
 */
export function configureLogger(options: { level: LogLevel }): void {
  currentLevelNum = LOG_LEVELS[options.level];
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  });

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

/**
 * Logger interface.
 */
export const logger: Logger & { child: (defaultContext: LogContext) => Logger } = {
  debug: (message, context) => log('debug', message, context),
  info: (message, context) => log('info', message, context),
  warn: (message, context) => log('warn', message, context),
  error: (message, context) => log('error', message, context),

  /**
   * Create a child logger with default context.
   */
  child: (defaultContext) => ({
    debug: (message, context) => log('debug', message, { ...defaultContext, ...context }),
    info: (message, context) => log('info', message, { ...defaultContext, ...context }),
    warn: (message, context) => log('warn', message, { ...defaultContext, ...context }),
    error: (message, context) => log('error', message, { ...defaultContext, ...context }),
  }),
};
