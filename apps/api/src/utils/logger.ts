import { destination, pino } from 'pino';

import { config } from '../config/index.js';

// stderr keeps stdout free for command output when the engine runs under the CLI
export const loggerTransport =
  config.env === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss Z',
        },
      }
    : undefined;

export const logger = loggerTransport
  ? pino({ level: config.logLevel, transport: loggerTransport })
  : pino({ level: config.logLevel }, destination(2));
