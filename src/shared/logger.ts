import pino, { type Logger } from 'pino';

/**
 * Creates a named module logger.
 *
 * Logs go to stderr so reports printed on stdout stay machine-readable.
 */
export function createLogger(name: string): Logger {
  return pino(
    {
      name: `leakguard:${name}`,
      level: process.env['LOG_LEVEL'] ?? 'warn',
    },
    pino.destination(2)
  );
}
