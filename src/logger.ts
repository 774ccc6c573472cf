import 'dotenv/config';
import pino from 'pino';

const underTest = process.env.VITEST !== undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (underTest ? 'silent' : 'info'),
  transport: underTest
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'SYS:standard',
        },
      },
  base: {
    service: 'multichain-whale-monitor',
  },
});
