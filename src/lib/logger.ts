/**
 * Pino logger shared by the dashboard. In the browser pino writes to the console;
 * under Node (tests) it writes JSON lines to stdout.
 */

import pino from 'pino';
import { getDashboardConfig } from '../config';

export const logger = pino({
  name: 'ops-dashboard',
  level: getDashboardConfig().logLevel,
  browser: { asObject: false },
});

export type Logger = typeof logger;

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
