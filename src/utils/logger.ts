import winston from 'winston';
import { ENVIRONMENT } from '../config/environment.js';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
});

export const logger = winston.createLogger({
  level: ENVIRONMENT.LOG_LEVEL,
  levels,
  silent: ENVIRONMENT.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true })
  ),
  defaultMeta: { service: 'entity-resolution' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        ENVIRONMENT.NODE_ENV === 'production' ? winston.format.uncolorize() : winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, stack, service: _service, ...meta }) => {
          let log = `${String(timestamp)} [${level}]: ${String(message)}`;
          if (Object.keys(meta).length > 0) {
            log += ` ${JSON.stringify(meta)}`;
          }
          if (typeof stack === 'string') {
            log += `\n${stack}`;
          }
          return log;
        })
      ),
    }),
  ],
});

/**
 * Normalize an unknown thrown value into loggable metadata.
 */
export function errorMeta(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

export default logger;
