import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVEL_ENV = 'INTROSPECTION_LOG_LEVEL';

export function createLogger(level: string = process.env[LOG_LEVEL_ENV] ?? 'warn'): Logger {
  return pino({ name: 'introspection', level });
}

let shared: Logger | null = null;

/** Lazily-created logger used when a component is not given one. */
export function defaultLogger(): Logger {
  if (shared === null) shared = createLogger();
  return shared;
}
