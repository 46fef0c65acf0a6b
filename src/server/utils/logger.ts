import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * Fields of the running pipeline (name, rule scheme), added to every record
 */
export const pipelineContext = new AsyncLocalStorage<Record<string, unknown>>();

export function getPipelineContext(): Record<string, unknown> {
  return pipelineContext.getStore() ?? {};
}

function createLogger(): Logger {
  const env = process.env.NODE_ENV || 'development';
  const isTest = env === 'test';
  const pretty = env === 'development';

  return pino({
    level: process.env.LOG_LEVEL || (isTest ? 'silent' : pretty ? 'debug' : 'info'),
    base: { env, service: 'package-insert-etl' },
    formatters: {
      level: label => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: getPipelineContext,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    }),
  });
}

export const logger = createLogger();
