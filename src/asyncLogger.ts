import logger from './logger';
import { loggingQueue } from './queues';

/**
 * Asynchronous logging helpers
 *
 * Roll handling runs on the caller's path; log formatting and writes are
 * pushed to the serial `loggingQueue` so they happen after the reply has
 * been produced.
 *
 * @module asyncLogger
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Enqueue a log message to be written via the application's logger.
 *
 * @param level - Winston level.
 * @param msg - Message text.
 */
export function enqueueLog(level: LogLevel, msg: string): void {
  loggingQueue.push(async () => {
    logger.log({ level, message: msg });
  });
}

/**
 * Message of an unknown thrown value, for log lines.
 */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
