import pino from 'pino';
import type { LoggerOptions } from 'pino';
import type { LoggingConfig } from './config';

export type Logger = pino.Logger;

const PRETTY_OPTIONS = {
  colorize: true,
  translateTime: 'HH:MM:ss',
  ignore: 'pid,hostname',
};

export function createLogger(config: LoggingConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    transport: config.file
      ? {
          targets: [
            {
              target: 'pino-pretty',
              level: config.level,
              options: PRETTY_OPTIONS,
            },
            {
              target: 'pino/file',
              level: config.level,
              options: {
                destination: config.file,
                mkdir: true,
              },
            },
          ],
        }
      : {
          target: 'pino-pretty',
          options: PRETTY_OPTIONS,
        },
  };

  return pino(options);
}

/**
 * Logger that drops everything. Used by tests and by library callers that
 * do not care about diagnostics.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
