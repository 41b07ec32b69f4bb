import pino, { type Logger } from 'pino';
import type { LoggingConfig } from '../config/config.js';

/**
 * Create the root logger. Output goes to stderr so CLI commands can keep
 * stdout for their JSON results.
 */
export function createLogger(config: LoggingConfig): Logger {
  return pino(
    {
      level: config.level,
      base: { app: 'journal-lens' },
    },
    pino.destination(2),
  );
}

/**
 * Logger that discards everything. Default for components built without one.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
