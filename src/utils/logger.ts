import { createLogger, format, transports } from 'winston';

/**
 * Application logger
 * JSON lines with timestamps; colorized console output outside production
 */
const base = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json()
  ),
  defaultMeta: { service: 'cv-job-alerts' },
  transports: [],
});

if (process.env.NODE_ENV === 'production') {
  base.add(new transports.Console());
} else {
  base.add(
    new transports.Console({
      silent: process.env.NODE_ENV === 'test' || process.env.VITEST === 'true',
      format: format.combine(
        format.colorize(),
        format.printf(({ level, message, timestamp, service: _service, ...metadata }) => {
          const metadataStr = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
          return `[${String(timestamp)}] ${level}: ${String(message)}${metadataStr}`;
        })
      ),
    })
  );
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    base.debug(message, metadata);
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    base.info(message, metadata);
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    base.warn(message, metadata);
  },

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    base.error(message, {
      ...metadata,
      ...(error === undefined ? {} : { error: describeError(error) }),
    });
  },
};

export type Logger = typeof logger;
