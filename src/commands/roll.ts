/**
 * Roll command helpers
 *
 * Parses the chat forms of the roll command and renders interpreter
 * results and failures as reply text. Evaluation itself is done by the
 * dice interpreter (`../dice`); nothing here inspects the expression.
 *
 * Supported command forms:
 * - `!roll` rolls the default expression
 * - `!roll <expression>` e.g. `!roll 3d6 + 2`
 * - `!d<expression>` e.g. `!d20`, `!d20 + 5`
 *
 * @module commands/roll
 */

import { formatNumber, formatRollEvent } from '../dice/formatter';
import type { DiceError } from '../dice/errors';
import type { EvalResult } from '../dice/types';

/**
 * Extract the expression from a roll command.
 *
 * Examples:
 * ```ts
 * parseRollCommand('!roll 3d6+1') // -> '3d6+1'
 * parseRollCommand('!d20')        // -> 'd20'
 * parseRollCommand('!roll')       // -> '1d6'
 * parseRollCommand('hello')       // -> null
 * ```
 *
 * @param text - The incoming message text.
 * @param defaultExpression - Used for a bare `!roll`.
 * @returns The expression to evaluate, or `null` if this is not a roll command.
 */
export function parseRollCommand(text: string, defaultExpression = '1d6'): string | null {
  const t = text.trim()
  if (/^!roll$/i.test(t)) return defaultExpression
  let m = t.match(/^!roll\s+([\s\S]+)$/i)
  if (m) return m[1].trim()
  m = t.match(/^!(d\d[\s\S]*)$/i)
  if (m) return m[1].trim()
  return null
}

/**
 * Reply text for a successful roll: the value in bold, then one line per
 * dice term and one per warning.
 */
export function describeRoll(result: EvalResult, decimals?: number): string {
  const lines = [`🎲 You rolled *${formatNumber(result.value, decimals)}*`]
  for (const event of result.rolls) lines.push(formatRollEvent(event, { decimals }))
  for (const warning of result.warnings) lines.push(`note: ${warning}`)
  return lines.join('\n')
}

/**
 * Reply text for an expression the interpreter rejected.
 */
export function describeRollError(expression: string, error: DiceError): string {
  return `⚠️ Could not roll \`${expression}\`: ${error.message}`
}
