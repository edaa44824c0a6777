/**
 * Pino logger for the mindmap pipeline.
 *
 * Callers own the level: the entry point passes the configured level,
 * tests pass `silent`.
 */
import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level = 'info'): Logger {
    return pino({ name: 'mindmap', level });
}
