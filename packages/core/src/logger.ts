import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Minimal structured logger used across packages.
 * Both `logger.info('msg')` and `logger.info({ key }, 'msg')` forms are accepted.
 */
export interface Logger {
  debug(obj: Record<string, unknown> | string, message?: string): void;
  info(obj: Record<string, unknown> | string, message?: string): void;
  warn(obj: Record<string, unknown> | string, message?: string): void;
  error(obj: Record<string, unknown> | string, message?: string): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Paths scrubbed from every log line. */
export const REDACTED_PATHS = [
  'credential',
  '*.credential',
  'authorization',
  'headers.authorization',
  'req.headers.authorization',
  'apiKey',
  '*.apiKey',
];

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
}

class PinoLogger implements Logger {
  constructor(private readonly pino: pino.Logger) {}

  debug(obj: Record<string, unknown> | string, message?: string): void {
    if (typeof obj === 'string') this.pino.debug(obj);
    else this.pino.debug(obj, message);
  }

  info(obj: Record<string, unknown> | string, message?: string): void {
    if (typeof obj === 'string') this.pino.info(obj);
    else this.pino.info(obj, message);
  }

  warn(obj: Record<string, unknown> | string, message?: string): void {
    if (typeof obj === 'string') this.pino.warn(obj);
    else this.pino.warn(obj, message);
  }

  error(obj: Record<string, unknown> | string, message?: string): void {
    if (typeof obj === 'string') this.pino.error(obj);
    else this.pino.error(obj, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.pino.child(bindings));
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new PinoLogger(
    pino({
      name: options.name ?? 'parley',
      level: options.level ?? 'info',
      redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    }),
  );
}
