/**
 * Structured logger using Pino.
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.debug({ strategy: 'maze', floor: 812 }, 'Maze carved');
 *   logger.warn({ attempt: 2, code: 'NO_REACHABLE_EXIT' }, 'Retrying level');
 */

import pino, { type Logger } from "pino";

export type { Logger };

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "production" ? "info" : "debug");

export const logger: Logger = pino({
  level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  base: {
    service: "descent-procgen",
    pid: process.pid,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Child logger tagged with the component it belongs to
 */
export function createLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
