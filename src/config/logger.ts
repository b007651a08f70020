import winston from 'winston';
import type { AppConfig } from './env';

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return `${timestamp} [${level}]: ${message} ${
      Object.keys(meta).length ? JSON.stringify(meta, null, 2) : ''
    }`;
  })
);

// Create logger instance; configureLogger() applies the loaded config
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'social-metrics-backend' },
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

export function configureLogger(config: AppConfig): void {
  logger.level = config.logging.level;
  logger.silent = config.api.nodeEnv === 'test';

  if (config.logging.file) {
    logger.add(
      new winston.transports.File({
        filename: config.logging.file,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        )
      })
    );
  }
}
