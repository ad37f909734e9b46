import winston from 'winston';
import { config } from './config';

const isProduction = config.server.env === 'production';

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${extra}`;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: { service: 'insight-graph' },
  format: isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
    : consoleFormat,
  transports: [
    new winston.transports.Console({
      silent: config.server.env === 'test',
    }),
  ],
});

/**
 * Child logger tagged with a component name, e.g. `createLogger('sandbox')`.
 */
export function createLogger(component: string): winston.Logger {
  return logger.child({ component });
}
