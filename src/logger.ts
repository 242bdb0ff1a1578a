import { destination, pino, type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

/** Library default: callers opt in to logging by passing their own logger */
export const silentLogger: Logger = pino({ level: 'silent' });

/**
 * Create the CLI logger. Writes JSON lines to stderr so stdout stays free for
 * the report.
 */
export function createLogger(level: LevelWithSilent = 'warn'): Logger {
  return pino({ name: 'zone-audit', level }, destination(2));
}
