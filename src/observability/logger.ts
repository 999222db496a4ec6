import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { appConfig } from '../config/index.js';
import type { ObservabilityConfig } from '../types/index.js';

export const LOGGER_NAME = 'media-harvest';

// Site cookies and tokens travel in request headers
export const REDACTED_PATHS = [
  'headers.Cookie',
  'headers.cookie',
  'headers.Authorization',
  'headers.authorization',
];

export interface CreateLoggerOptions extends ObservabilityConfig {
  pretty?: boolean;
  /** Writes JSON lines here instead of stdout; disables pretty printing */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const usePretty = options.pretty === true && options.destination === undefined;

  const loggerOptions: LoggerOptions = {
    name: LOGGER_NAME,
    level: options.logLevel,
    redact: REDACTED_PATHS,
    transport: usePretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname,name',
      },
    } : undefined,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

export const logger = createLogger({
  logLevel: appConfig.observability.logLevel,
  pretty: appConfig.environment === 'development',
});

export interface LogContext {
  component?: string;
  tag?: string;
  origin?: string;
  operation?: string;
  [key: string]: unknown;
}

export const createContextLogger = (context: LogContext, parent: Logger = logger): Logger => {
  return parent.child(context);
};

export type { Logger };

export default logger;
