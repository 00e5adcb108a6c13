/**
 * Package entry point
 *
 * Re-exports the dice interpreter, the chat reply handler and the config
 * helpers. Run directly (`node dist/index.js roll 2d6`), it behaves like
 * the CLI.
 *
 * @module index
 */

import { main } from './cli';

export * from './dice';
export { getReplyForText } from './handler';
export type { HandlerOptions, Reply } from './handler';
export { describeRoll, describeRollError, parseRollCommand } from './commands/roll';
export { loadRuntimeConfig, readConfig, readConfigSync, resolveRuntimeConfig } from './config';
export type { RuntimeConfig } from './config';
export { runCLI } from './cli';

if (require.main === module) {
  void main();
}
