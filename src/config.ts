import fs from 'fs/promises';
import fsSync from 'fs';
import { describeError, enqueueLog } from './asyncLogger';
import { resolveBudget } from './dice/budget';
import { DEFAULT_DECIMALS } from './dice/formatter';
import { isRandomMethod, type RandomMethod } from './dice/random';
import type { Budget } from './dice/types';

/**
 * Configuration file helpers
 *
 * Reads `config.json` and resolves it into a fully-populated
 * `RuntimeConfig`. Missing files and missing keys fall back to defaults;
 * unreadable files and invalid values also fall back, with a logged
 * warning naming what was ignored.
 *
 * Recognised keys:
 * ```json
 * {
 *   "dice": { "maxTotalDice": 1000, "maxSides": 100000, "maxAstDepth": 64,
 *             "maxExpansionCount": 512, "defaultPoolThreshold": 8,
 *             "maxInputLength": 500 },
 *   "format": { "decimals": 2 },
 *   "rng": { "method": "math", "seed": null },
 *   "commands": { "defaultExpression": "1d6" }
 * }
 * ```
 *
 * @module config
 */

export const DEFAULT_CONFIG_PATH = 'config.json';

export type JsonObject = Record<string, unknown>;

export interface RuntimeConfig {
  budget: Budget;
  maxInputLength: number;
  decimals: number;
  rng: { method: RandomMethod; seed: number | null };
  defaultExpression: string;
}

const BUDGET_KEYS: ReadonlyArray<keyof Budget> = [
  'maxTotalDice',
  'maxSides',
  'maxAstDepth',
  'maxExpansionCount',
  'defaultPoolThreshold',
];

export function isJsonObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(obj: JsonObject, key: string): JsonObject {
  const v = obj[key];
  return isJsonObject(v) ? v : {};
}

/**
 * Read and parse a JSON configuration file asynchronously.
 *
 * @param cfgPath - Path to the JSON file.
 * @returns The parsed object; `{}` when the file is missing, unreadable or
 *   not a JSON object.
 */
export async function readConfig(cfgPath: string = DEFAULT_CONFIG_PATH): Promise<JsonObject> {
  try {
    if (!fsSync.existsSync(cfgPath)) return {};
    const parsed: unknown = JSON.parse(await fs.readFile(cfgPath, 'utf8'));
    if (isJsonObject(parsed)) return parsed;
    enqueueLog('warn', `Config ${cfgPath} is not a JSON object; using defaults`);
    return {};
  } catch (e) {
    enqueueLog('warn', `Failed to read config ${cfgPath}: ${describeError(e)}`);
    return {};
  }
}

/**
 * Synchronous variant of `readConfig` for module initialisation.
 */
export function readConfigSync(cfgPath: string = DEFAULT_CONFIG_PATH): JsonObject {
  try {
    if (!fsSync.existsSync(cfgPath)) return {};
    const parsed: unknown = JSON.parse(fsSync.readFileSync(cfgPath, 'utf8'));
    if (isJsonObject(parsed)) return parsed;
    enqueueLog('warn', `Config ${cfgPath} is not a JSON object; using defaults`);
    return {};
  } catch (e) {
    enqueueLog('warn', `Failed to read config ${cfgPath}: ${describeError(e)}`);
    return {};
  }
}

/**
 * Merge a parsed config object with defaults and validate it.
 *
 * @param raw - Parsed `config.json` contents.
 * @returns The resolved config and a list of the keys that were invalid
 *   and replaced by defaults (also logged as warnings).
 */
export function resolveRuntimeConfig(raw: JsonObject = {}): {
  config: RuntimeConfig;
  ignored: string[];
} {
  const ignored: string[] = [];
  const dice = section(raw, 'dice');

  const partial: Partial<Budget> = {};
  for (const key of BUDGET_KEYS) {
    const v = dice[key];
    if (v === undefined || v === null) continue;
    if (typeof v === 'number') partial[key] = v;
    else ignored.push(`dice.${key}`);
  }
  const { budget, invalid } = resolveBudget(partial);
  ignored.push(...invalid.map(k => `dice.${k}`));

  const intIn = (v: unknown, key: string, min: number, max: number, fallback: number): number => {
    if (v === undefined || v === null) return fallback;
    if (typeof v === 'number' && Number.isInteger(v) && v >= min && v <= max) return v;
    ignored.push(key);
    return fallback;
  };

  const maxInputLength = intIn(dice.maxInputLength, 'dice.maxInputLength', 1, 100000, 500);
  const decimals = intIn(section(raw, 'format').decimals, 'format.decimals', 0, 10, DEFAULT_DECIMALS);

  const rngRaw = section(raw, 'rng');
  let method: RandomMethod = 'math';
  if (rngRaw.method !== undefined) {
    if (isRandomMethod(rngRaw.method)) method = rngRaw.method;
    else ignored.push('rng.method');
  }
  let seed: number | null = null;
  if (rngRaw.seed !== undefined && rngRaw.seed !== null) {
    if (typeof rngRaw.seed === 'number' && Number.isFinite(rngRaw.seed)) seed = rngRaw.seed;
    else ignored.push('rng.seed');
  }

  const cmdRaw = section(raw, 'commands').defaultExpression;
  let defaultExpression = '1d6';
  if (cmdRaw !== undefined) {
    if (typeof cmdRaw === 'string' && cmdRaw.trim() !== '') defaultExpression = cmdRaw.trim();
    else ignored.push('commands.defaultExpression');
  }

  for (const key of ignored) enqueueLog('warn', `Invalid config value for ${key}; using default`);

  return {
    config: { budget, maxInputLength, decimals, rng: { method, seed }, defaultExpression },
    ignored,
  };
}

/**
 * Read `config.json` and resolve it.
 */
export async function loadRuntimeConfig(cfgPath: string = DEFAULT_CONFIG_PATH): Promise<RuntimeConfig> {
  return resolveRuntimeConfig(await readConfig(cfgPath)).config;
}
