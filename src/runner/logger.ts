import winston from 'winston';

export type LogMeta = Record<string, unknown>;

// Structural subset of winston's Logger, so a winston instance can be passed as-is.
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel = 'info'): Logger {
  return winston.createLogger({
    level,
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVELS],
        format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
      }),
    ],
  });
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
