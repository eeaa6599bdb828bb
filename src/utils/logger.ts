import pino, { type Logger as PinoLogger } from 'pino';
import { config } from '../config/index.js';

const transport = config.logging.pretty
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    }
  : undefined;

// stdout belongs to query results, so logs go to stderr
export const logger = transport
  ? pino({ level: config.logging.level, transport })
  : pino({ level: config.logging.level }, pino.destination(2));

export type Logger = PinoLogger;
