import pino, { type Logger, type DestinationStream } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LEVEL: LogLevel = 'info';

const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'token',
  'password',
  'secret',
  'headers["x-api-key"]',
];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * An unknown LOG_LEVEL falls back to `info` here; the environment schema
 * reports it once configuration is loaded.
 */
function levelFromEnv(): LogLevel {
  const value = process.env.LOG_LEVEL;
  return isLogLevel(value) ? value : DEFAULT_LEVEL;
}

export function createRootLogger(destination?: DestinationStream, level: LogLevel = levelFromEnv()): Logger {
  const options = {
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

const logger = createRootLogger();

/** Module loggers; their level follows setLogLevel. */
const moduleLoggers = new Set<Logger>();

export function createLogger(context: Record<string, unknown>): Logger {
  const child = logger.child(context);
  moduleLoggers.add(child);
  return child;
}

/**
 * Apply the validated level to the root logger and every module logger.
 * Children created afterwards inherit it.
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
}

export type { Logger };

export default logger;
