import winston from 'winston';
import { env } from '../config/env.js';

const { combine, timestamp, errors, splat, json, colorize, printf } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level}: ${String(stack ?? message)}${rest}`;
});

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === 'test',
  format: combine(
    timestamp(),
    errors({ stack: true }),
    splat(),
    env.NODE_ENV === 'production' ? json() : combine(colorize(), devFormat),
  ),
  transports: [new winston.transports.Console()],
});
