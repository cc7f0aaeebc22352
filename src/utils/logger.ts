import pino, { type Logger } from 'pino';
import { env } from '../config/env';

// stdout belongs to the CLI; logs go to stderr
export const logger: Logger = pino(
  {
    name: 'voicepack',
    level: env.LOG_LEVEL,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination(2)
);

export type { Logger };

export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
