/**
 * Winston logger: JSON lines in production, colorized one-liners locally,
 * silent while Jest runs.
 */
import winston from 'winston';

// Read straight from the environment: modules log before loadConfig() runs.
// server.ts re-applies the validated LOG_LEVEL once config is loaded.
const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

const formatForProduction = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const formatForDev = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const extra = Object.keys(meta).filter(k => k !== 'service');
    const metaStr = extra.length ? ' ' + JSON.stringify(meta) : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
  level: logLevel,
  format: nodeEnv === 'production' ? formatForProduction : formatForDev,
  defaultMeta: { service: 'intake-assistant' },
  silent: nodeEnv === 'test',
  transports: [new winston.transports.Console()]
});
