/**
 * Structured logger built on pino.
 *
 * Silent unless `LOOMTPL_LOG_LEVEL` is set.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';

const logLevel = process.env.LOOMTPL_LOG_LEVEL ?? 'silent';

export const logger: Logger = pino({
  name: 'loomtpl',
  level: logLevel,
});

export function createModuleLogger (module: string): Logger {
  return logger.child({ module });
}
