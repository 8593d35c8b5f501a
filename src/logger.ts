import { pino, type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';

export type { Logger };

export function loggerOptions(config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>): LoggerOptions {
  return {
    level: config.logLevel,
    redact: ['req.body', 'reply.body', 'payload'],
    transport: config.nodeEnv === 'development' ? { target: 'pino-pretty' } : undefined,
  };
}

export function createLogger(config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return pino(loggerOptions(config));
}

/** Logger that drops everything; the default for components built in tests. */
export const silentLogger: Logger = pino({ level: 'silent' });
