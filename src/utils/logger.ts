import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const isTest = process.env.NODE_ENV === 'test';

export type { Logger };

/** Credential fields masked in every log line */
export const REDACTED_PATHS = ['apiKey', 'config.apiKey', 'headers', 'config.headers'];

export interface CreateLoggerOptions {
  level?: string;
  /** Write here instead of stdout (no worker transport) */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? (isTest ? 'silent' : process.env.LOG_LEVEL || 'info'),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    base: {
      service: 'gemini-stream-relay',
    },
  };

  if (options.destination) {
    return pino(pinoOptions, options.destination);
  }

  return pino({
    ...pinoOptions,
    transport: isTest ? undefined : { target: 'pino/file', options: { destination: 1 } },
  });
}

export const logger = createLogger();

export const createModuleLogger = (module: string): Logger => logger.child({ module });
