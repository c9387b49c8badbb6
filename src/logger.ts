import pino from 'pino';
import { getConfig, type Config } from './config/env';

export interface LogMeta {
  operation?: string;
  file?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level?: Config['logLevel'];
  format?: Config['logFormat'];
}

let initialized = false;
let rootLogger: Logger | undefined;

function createPino(level: Config['logLevel'], format: Config['logFormat']): pino.Logger {
  if (format === 'pretty') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  }
  // stdout belongs to command output
  return pino({ level }, pino.destination(2));
}

/**
 * Create the process-wide logger. Only the first call has any effect;
 * later calls return the logger that already exists.
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  if (initialized && rootLogger) {
    return rootLogger;
  }

  const config = getConfig();
  const pinoLogger = createPino(options.level ?? config.logLevel, options.format ?? config.logFormat);

  rootLogger = {
    debug: (message, meta) => pinoLogger.debug(meta ?? {}, message),
    info: (message, meta) => pinoLogger.info(meta ?? {}, message),
    warn: (message, meta) => pinoLogger.warn(meta ?? {}, message),
    error: (message, meta) => pinoLogger.error(meta ?? {}, message),
  };
  initialized = true;
  return rootLogger;
}

export function getLogger(): Logger {
  return rootLogger ?? initLogger();
}
