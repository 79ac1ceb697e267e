import winston from 'winston';
import path from 'path';
import { config } from '../config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// JSON.stringify that survives circular references and Error values
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
    }
    return value;
  });
}

const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let log = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    try {
      log += ` ${safeStringify(metadata)}`;
    } catch (error) {
      log += ` [Error stringifying metadata: ${error instanceof Error ? error.message : 'Unknown error'}]`;
    }
  }

  if (typeof stack === 'string') {
    log += `\n${stack}`;
  }

  return log;
});

const stampFormat = timestamp({ format: 'YYYY-MM-DD HH:mm:ss' });

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.isTest,
  format: combine(errors({ stack: true }), stampFormat, logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), errors({ stack: true }), stampFormat, logFormat),
    }),
  ],
});

if (config.isProduction) {
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export default logger;
