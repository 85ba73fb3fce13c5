import pino, { type Logger } from 'pino';
import { config } from '../config/env.js';

export type { Logger };

export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: 'relaydesk-api' },
});

/**
 * Child logger tagged with the module name, e.g. createLogger('intake')
 */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
