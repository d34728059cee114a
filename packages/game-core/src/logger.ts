// packages/game-core/src/logger.ts
//
// pino loggers for the engine. The module logger follows LOG_LEVEL (falling
// back to "info" when it is not a pino level, so importing the package never
// fails); the engine factory builds its own at the configured level, and each
// game logs through a child carrying its gameId.

import { pino, type Logger } from 'pino';
import { z } from 'zod';

export type { Logger };

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'wordmaster', level });
}

export const log: Logger = createLogger(logLevelSchema.catch('info').parse(process.env.LOG_LEVEL));
