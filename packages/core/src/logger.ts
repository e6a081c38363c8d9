// packages/core/src/logger.ts
import { pino, type BaseLogger, type Level } from 'pino';

/**
 * The slice of pino the packages log through. Fastify's `req.log` and a plain
 * pino instance both satisfy it.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function createLogger(opts: { level?: Level | 'silent'; name?: string } = {}) {
  return pino({
    name: opts.name ?? 'fieldlink',
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
  });
}

/** for tests */
export const silentLogger: Logger = pino({ level: 'silent' });
