/**
 * Shared structured logger.
 *
 * JSON lines in production, pretty-printed when NODE_ENV=development.
 * Level comes straight from the environment so the logger can be imported
 * before (and independently of) config validation.
 */

import pino from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type Level = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): Level {
  const value = raw?.trim().toLowerCase();
  return LEVELS.find((level) => level === value) ?? 'info';
}

export const logger = pino({
  name: 'nudge',
  level: resolveLevel(process.env.LOG_LEVEL),
  transport: process.env.NODE_ENV === 'development'
    ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    }
    : undefined,
});

export type Logger = typeof logger;
