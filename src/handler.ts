import { describeError, enqueueLog } from './asyncLogger'
import { describeRoll, describeRollError, parseRollCommand } from './commands/roll'
import { readConfigSync, resolveRuntimeConfig, type RuntimeConfig } from './config'
import { tryRoll } from './dice'
import { createRandomSource } from './dice/random'
import type { RandomSource } from './dice/types'

/**
 * Message handler helpers
 *
 * Maps incoming chat text to reply text for the supported commands
 * (`!roll`, `!d…`, `!help`). Receiving and sending messages is left to the
 * host; this module only decides what to answer.
 *
 * @module handler
 */

/**
 * Reply payload returned by `getReplyForText`.
 */
export type Reply = { text: string }

export interface HandlerOptions {
  /** Overrides the config loaded from `config.json`. */
  config?: RuntimeConfig
  /** Overrides the configured random source. */
  random?: RandomSource
}

let runtimeConfig: RuntimeConfig | null = null

/** One random source per config, so a seeded generator advances across messages. */
const randomSources = new WeakMap<RuntimeConfig, RandomSource>()

function randomFor(cfg: RuntimeConfig): RandomSource {
  let source = randomSources.get(cfg)
  if (!source) {
    source = createRandomSource(cfg.rng.method, cfg.rng.seed)
    randomSources.set(cfg, source)
  }
  return source
}

/**
 * Runtime configuration, loaded from `config.json` on first use.
 */
function currentConfig(): RuntimeConfig {
  if (!runtimeConfig) runtimeConfig = resolveRuntimeConfig(readConfigSync()).config
  return runtimeConfig
}

/**
 * Short help lines used by `!help`.
 */
const commandHelp: Record<string, string> = {
  roll: '!roll <expression>: roll dice, e.g. `!roll 3d6 + 2`, `!roll 4wod8`, `!roll 2d{-5,-1}`',
  rollDefault: '!roll: roll the default expression',
  d: '!dN: shorthand for `!roll dN`, e.g. `!d20`',
  help: '!help: show this help message',
}

/**
 * Convert an incoming message text into an optional reply.
 *
 * Recognized commands:
 * - `!help` -> list of commands
 * - `!roll`, `!roll <expr>`, `!d<expr>` -> roll result with breakdown, or
 *   an explanation of why the expression was rejected
 *
 * Messages longer than `dice.maxInputLength` are ignored.
 *
 * @param text - The incoming message text.
 * @param options - Config and randomness overrides.
 * @returns A `Reply`, or `null` when the message is not a command.
 */
export function getReplyForText(text: string, options: HandlerOptions = {}): Reply | null {
  if (!text) return null
  const trimmed = text.trim()
  const cfg = options.config ?? currentConfig()

  if (trimmed.length === 0 || trimmed.length > cfg.maxInputLength) return null

  if (/^!help\s*$/i.test(trimmed)) {
    return { text: `Available commands:\n${Object.values(commandHelp).join('\n')}` }
  }

  const expression = parseRollCommand(trimmed, cfg.defaultExpression)
  if (expression === null) return null

  enqueueLog('debug', `Handling roll \`${expression}\``)
  const random = options.random ?? randomFor(cfg)
  try {
    const outcome = tryRoll(expression, cfg.budget, random)
    if (!outcome.ok) {
      enqueueLog('warn', `Rejected roll \`${expression}\`: ${outcome.error.code} ${outcome.error.message}`)
      return { text: describeRollError(expression, outcome.error) }
    }
    return { text: describeRoll(outcome.result, cfg.decimals) }
  } catch (e) {
    enqueueLog('error', `Failed to evaluate \`${expression}\`: ${describeError(e)}`)
    return { text: `⚠️ Could not roll \`${expression}\`` }
  }
}
