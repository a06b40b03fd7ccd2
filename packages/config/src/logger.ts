/**
 * Shared pino logger factory
 *
 * Logs go to stderr so command output on stdout stays machine-readable.
 * Set LOG_PRETTY=true for pino-pretty formatting.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(name: string): Logger {
  const level = process.env.LOG_LEVEL || 'info';

  if (process.env.LOG_PRETTY === 'true') {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ name, level }, pino.destination({ dest: 2, sync: true }));
}
