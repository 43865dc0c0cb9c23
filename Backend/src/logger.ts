import pino from 'pino';

function defaultLevel(): string {
  if (process.env.NODE_ENV === 'production') return 'info';
  if (process.env.NODE_ENV === 'test') return 'silent';
  return 'debug';
}

export const log = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  base: undefined, // keeps logs small (no pid/hostname)
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;
