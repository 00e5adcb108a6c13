import { createQueue } from './threads';

/**
 * Application queues.
 *
 * @module queues
 */

/**
 * Log writes. Concurrency 1 keeps entries in the order they were emitted.
 */
export const loggingQueue = createQueue(1);
