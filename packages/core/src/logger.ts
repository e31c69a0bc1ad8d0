/**
 * Console-backed logger gated by level
 */

import type { LogLevel } from './config';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

const RANK: Record<LogLevel, number> = { silent: 0, warn: 1, debug: 2 };

export function createLogger(level: LogLevel, scope = 'strata'): Logger {
  const rank = RANK[level];
  return {
    debug(message) {
      if (rank >= RANK.debug) console.debug(`[${scope}] ${message}`);
    },
    warn(message) {
      if (rank >= RANK.warn) console.warn(`[${scope}] ${message}`);
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
