import pino, { stdTimeFunctions } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export type CreateLoggerOptions = {
  level?: string;
  name?: string;
};

export const createLoggerOptions = (options: CreateLoggerOptions = {}): LoggerOptions => ({
  level: options.level ?? 'info',
  name: options.name,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(createLoggerOptions(options));
}

export const silentLogger: Logger = pino({ level: 'silent' });
