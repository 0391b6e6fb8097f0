import pino from 'pino';
import { config } from './config';

const env = process.env.NODE_ENV ?? 'development';
const pretty = env === 'development' && process.stdout.isTTY;

export const logger = pino({
  level: config.logLevel ?? (env === 'test' ? 'silent' : 'info'),
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
          singleLine: true,
        },
      }
    : undefined,
});

export type { Logger } from 'pino';
