import pino, { type Logger } from 'pino';

import { loadConfig } from './Config.ts';

import type { SimXhrConfig } from './Config.ts';

export type { Logger } from 'pino';

export function createLogger(config: Pick<SimXhrConfig, 'logLevel'>): Logger {
  return pino({ name: 'sim-xhr', level: config.logLevel });
}

let defaultLogger: Logger | undefined;

/**
 * @returns The process-wide logger, created from loadConfig() on first use
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger(loadConfig());
  return defaultLogger;
}
