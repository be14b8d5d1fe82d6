import pino, { type Logger, type LoggerOptions } from 'pino';
import { loadRuntimeConfig } from './config';

export const logFormats = ['cli', 'formatted'] as const;

/** `cli` prints coloured messages for a terminal, `formatted` one JSON object per line. */
export type LogFormat = (typeof logFormats)[number];

const runtime = loadRuntimeConfig();

function transportFor(format: LogFormat | undefined): LoggerOptions['transport'] {
  if (format === 'formatted' || (format === undefined && runtime.env !== 'development')) {
    return undefined;
  }
  return {
    target: 'pino-pretty',
    options:
      format === 'cli'
        ? { colorize: true, ignore: 'pid,hostname,service,env,time' }
        : { colorize: true, translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname,service,env' },
  };
}

export function loggerOptions(format: LogFormat | undefined, level: string): LoggerOptions {
  return {
    level,
    transport: transportFor(format),
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    base: {
      service: 'bank-feed-archiver',
      env: runtime.env,
    },
  };
}

export let logger: Logger = pino(loggerOptions(undefined, runtime.logLevel));

/**
 * Rebuild the shared logger with another output format, keeping its level.
 */
export function setLogFormat(format: LogFormat): void {
  logger = pino(loggerOptions(format, logger.level));
}
