import pino from 'pino';
import { config, type LogLevel } from './config';

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: LogLevel;
  // Defaults to stderr so stdout only carries the report
  destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: 'batch-apply',
      level: options.level ?? config.LOG_LEVEL,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.destination ?? pino.destination(2)
  );
}

export const logger: Logger = createLogger();
