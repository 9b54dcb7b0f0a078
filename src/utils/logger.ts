/**
 * Structured, level-filtered logging.
 *
 * Loggers are plain values created per resolution context; nothing here is
 * module-global, so tests can capture output by passing their own handler.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  handler?: LogHandler;
  context?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Writes one JSON line per entry to stderr, keeping stdout for results. */
export const stderrJsonHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  process.stderr.write(`${line}\n`);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'warn';
  const handler = options.handler ?? stderrJsonHandler;
  const baseContext = options.context ?? {};

  const log = (
    level: LogEntry['level'],
    message: string,
    context?: Record<string, unknown>,
  ): void => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    handler({
      level,
      message,
      context: { ...baseContext, ...context },
      timestamp: new Date().toISOString(),
    });
  };

  return {
    debug: (msg, ctx) => log('debug', msg, ctx),
    info: (msg, ctx) => log('info', msg, ctx),
    warn: (msg, ctx) => log('warn', msg, ctx),
    error: (msg, ctx) => log('error', msg, ctx),
    child: (childContext) =>
      createLogger({
        level: minLevel,
        handler,
        context: { ...baseContext, ...childContext },
      }),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: 'silent' });
