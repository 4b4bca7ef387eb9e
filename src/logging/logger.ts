import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_REDACT_PATHS = ['*.apiKey', '*.openaiApiKey', '*.headers.authorization'];

export interface CreateLoggerOptions {
  service?: string;
  level?: LogLevel;
  redactPaths?: string[];
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: opts.level ?? 'info',
    // Replaces pino's default pid/hostname bindings.
    base: { service: opts.service ?? 'lab-rag-pipeline' },
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    redact: {
      paths: [...DEFAULT_REDACT_PATHS, ...(opts.redactPaths ?? [])],
      censor: '[REDACTED]',
    },
  };
  return opts.destination ? pino(loggerOptions, opts.destination) : pino(loggerOptions);
}

export const silentLogger: Logger = pino({ level: 'silent' });
