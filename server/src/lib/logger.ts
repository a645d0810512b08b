import winston from 'winston';
import { env } from '../config/env';

export type LogMeta = Record<string, unknown>;

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

export const logger = winston.createLogger({
  level: env.logLevel,
  defaultMeta: { service: 'ttt-live-server' },
  silent: env.nodeEnv === 'test',
  transports: [
    new winston.transports.Console({
      format: env.nodeEnv === 'production' ? jsonFormat : consoleFormat,
    }),
  ],
});

export function errorMeta(err: unknown): LogMeta {
  if (err instanceof Error) return { error: err.message, errorName: err.name };
  return { error: String(err) };
}
