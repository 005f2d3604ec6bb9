import pino from 'pino';

/**
 * Structured logger
 * Writes JSON to stderr so the interactive menu on stdout stays readable
 */
export const logger = pino(
  {
    name: 'playlist-bridge',
    level: process.env.LOG_LEVEL || 'info'
  },
  pino.destination(2)
);
