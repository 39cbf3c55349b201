/**
 * Leveled console logger with component context
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LoggerContext {
  component?: string;
  sensorId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(context: LoggerContext): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * Resolve the configured level from SENSIM_LOG_LEVEL (default: warn)
 */
export function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env.SENSIM_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'warn';
}

function formatLine(
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  context: LoggerContext,
  metadata?: Record<string, unknown>
): string {
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
    ...metadata,
  };
  return JSON.stringify(entry);
}

/**
 * Create a logger. Output is one JSON line per entry.
 */
export function createLogger(context: LoggerContext = {}, level: LogLevel = getConfiguredLogLevel()): Logger {
  const threshold = LOG_LEVEL_PRIORITY[level];
  const emit = (
    lvl: Exclude<LogLevel, 'silent'>,
    message: string,
    metadata?: Record<string, unknown>
  ) => {
    if (LOG_LEVEL_PRIORITY[lvl] < threshold) return;
    const line = formatLine(lvl, message, context, metadata);
    if (lvl === 'error') console.error(line);
    else if (lvl === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, metadata) => emit('debug', message, metadata),
    info: (message, metadata) => emit('info', message, metadata),
    warn: (message, metadata) => emit('warn', message, metadata),
    error: (message, metadata) => emit('error', message, metadata),
    child: (childContext) => createLogger({ ...context, ...childContext }, level),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger({}, 'silent');

/** Process-wide default logger */
export const logger: Logger = createLogger({ service: 'sensim' });
