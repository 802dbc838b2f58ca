/**
 * Application logger (pino)
 *
 * Logs go to stderr so stdout stays free for the record stream.
 */

import pino from 'pino';
import { env } from '../config/env.js';

function createTransport(): pino.DestinationStream | undefined {
  if (env.NODE_ENV === 'test') {
    return undefined;
  }

  const level = env.LOG_LEVEL === 'silent' ? 'fatal' : env.LOG_LEVEL;

  return pino.transport({
    targets: [
      env.NODE_ENV === 'production'
        ? { target: 'pino/file', level, options: { destination: 2 } }
        : {
            target: 'pino-pretty',
            level,
            options: { destination: 2, colorize: true, translateTime: 'SYS:HH:MM:ss' },
          },
      {
        target: 'pino/file',
        level,
        options: { destination: env.LOG_FILE, mkdir: true },
      },
    ],
  });
}

const options: pino.LoggerOptions = {
  level: env.LOG_LEVEL,
  serializers: {
    error: pino.stdSerializers.err,
  },
};

const transport = createTransport();

export const logger = transport ? pino(options, transport) : pino(options);

export type Logger = pino.Logger;
