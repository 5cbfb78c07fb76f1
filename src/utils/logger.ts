import pino, { type Logger } from 'pino';
import { env } from '../config/env';

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'chronicle-core' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Module-scoped child logger. Every line carries `module` so a single
 * resolution can be followed across services.
 */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
