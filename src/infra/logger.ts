import pino, { type Logger, type LoggerOptions } from 'pino';

// Keys whose values never reach the log output
const REDACTED_PATHS = [
  'password',
  'passwordHash',
  'accessToken',
  'token',
  'authorization',
  '*.password',
  '*.passwordHash',
  '*.accessToken',
  '*.token',
  '*.authorization',
  'req.headers.authorization',
  'req.headers.cookie',
];

export interface CreateLoggerOptions {
  name: string;
  level?: string;
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info' } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions);
}

export const logger = createLogger({ name: 'portfolio-cms-api' });

export type { Logger };
