/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * Pretty-prints on an interactive terminal, plain JSON everywhere else.
 *
 * The root logger is created once and writes through a switchable
 * destination, so initLogger() also reconfigures module loggers that were
 * handed out before it ran.
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;
let output: DestinationStream | null = null;
let prettyStream: DestinationStream | null = null;
let plainStream: DestinationStream | null = null;
const moduleLoggers = new Map<string, Logger>();

const destination: DestinationStream = {
  write(msg: string): void {
    output?.write(msg);
  },
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return isLogLevel(raw) ? raw : undefined;
}

function selectStream(pretty: boolean): DestinationStream {
  if (pretty) {
    prettyStream ??= pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '[{module}] {msg}',
      },
    });
    return prettyStream;
  }
  plainStream ??= pino.destination(1);
  return plainStream;
}

/**
 * Initialize or reconfigure the root logger. Every module logger follows
 * the new level and destination.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && process.stdout.isTTY === true);

  output = selectStream(pretty);
  if (!rootLogger) {
    rootLogger = pino({ level }, destination);
  } else {
    rootLogger.level = level;
  }
  for (const child of moduleLoggers.values()) {
    child.level = level;
  }
  return rootLogger;
}

/**
 * Get the root logger instance.
 * Auto-initializes if not already initialized.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 * One logger per module name.
 */
export function getLogger(module: string): Logger {
  const existing = moduleLoggers.get(module);
  if (existing) return existing;
  const child = getRootLogger().child({ module });
  moduleLoggers.set(module, child);
  return child;
}
