#!/usr/bin/env node
import { describeError, enqueueLog } from './asyncLogger';
import { DEFAULT_CONFIG_PATH, loadRuntimeConfig } from './config';
import {
  createRandomSource,
  format,
  isDiceError,
  isRandomMethod,
  listFunctions,
  parseExpression,
  renderExpression,
  roll,
} from './dice';
import { loggingQueue } from './queues';
import { describeArity } from './dice/registry';
import type { RandomMethod } from './dice/random';

/**
 * Command-line interface
 *
 * Evaluates expressions from the shell, validates them without rolling,
 * and lists the allowed functions. Limits and output precision come from
 * `config.json` (or `--config <path>`).
 *
 * Exit codes: 0 success, 1 the expression was rejected, 2 usage error.
 *
 * @module cli
 */

interface CliFlags {
  json: boolean;
  seed: number | null;
  rng: RandomMethod | null;
  configPath: string;
  rest: string[];
}

/**
 * Print usage information for the CLI to stdout.
 */
function printUsage() {
  console.log('Dice Sandbox CLI');
  console.log('Usage: dice-sandbox <command> [options] [expression]');
  console.log('Commands:');
  console.log('  roll <expression>     Evaluate an expression and print the breakdown');
  console.log('  check <expression>    Parse an expression without rolling and print its structure');
  console.log('  functions             List the functions expressions may call');
  console.log('  help, -h, --help      Show this help');
  console.log('Options:');
  console.log('  --seed <n>            Use the seeded mulberry32 generator');
  console.log('  --rng <method>        math | crypto | mulberry32');
  console.log('  --json                Print the result as JSON');
  console.log(`  --config <path>       Config file (default ${DEFAULT_CONFIG_PATH})`);
}

/**
 * Split option flags from positional arguments. Returns an error message
 * instead of flags when an option is malformed.
 */
function parseFlags(args: string[]): CliFlags | string {
  const flags: CliFlags = { json: false, seed: null, rng: null, configPath: DEFAULT_CONFIG_PATH, rest: [] };
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === '--json') {
      flags.json = true;
    } else if (a === '--seed') {
      const seed = Number(args[++i]);
      if (!Number.isFinite(seed)) return '--seed expects a number';
      flags.seed = seed;
    } else if (a === '--rng') {
      const method = args[++i];
      if (!isRandomMethod(method)) return `--rng expects one of math, crypto, mulberry32`;
      flags.rng = method;
    } else if (a === '--config') {
      const p = args[++i];
      if (!p) return '--config expects a path';
      flags.configPath = p;
    } else {
      flags.rest.push(a);
    }
  }
  return flags;
}

/**
 * Execute a CLI command.
 *
 * @param argv - Arguments after the script name.
 * @returns Exit code suitable for `process.exit`.
 */
export async function runCLI(argv: string[]): Promise<number> {
  const args = argv || [];
  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  const cmd = args[0];
  const flags = parseFlags(args.slice(1));
  if (typeof flags === 'string') {
    console.error(flags);
    return 2;
  }

  if (cmd === 'functions') {
    for (const fn of listFunctions()) {
      console.log(`${fn.name.padEnd(6)} ${describeArity(fn.arity).padEnd(11)} ${fn.description}`);
    }
    return 0;
  }

  if (cmd !== 'roll' && cmd !== 'check') {
    console.error('Unknown command:', cmd);
    printUsage();
    return 2;
  }

  const expression = flags.rest.join(' ').trim();
  if (!expression) {
    console.error(`Usage: ${cmd} <expression>`);
    return 2;
  }

  const cfg = await loadRuntimeConfig(flags.configPath);
  if (expression.length > cfg.maxInputLength) {
    console.error(`Expression longer than ${cfg.maxInputLength} characters`);
    return 2;
  }

  try {
    if (cmd === 'check') {
      const ast = parseExpression(expression, cfg.budget);
      console.log(flags.json ? JSON.stringify(ast) : renderExpression(ast));
      return 0;
    }

    const method = flags.rng ?? (flags.seed !== null ? 'mulberry32' : cfg.rng.method);
    const random = createRandomSource(method, flags.seed ?? cfg.rng.seed);
    const result = roll(expression, cfg.budget, random);
    console.log(flags.json ? JSON.stringify(result) : format(result, { decimals: cfg.decimals }));
    return 0;
  } catch (e) {
    if (!isDiceError(e)) throw e;
    enqueueLog('warn', `CLI ${cmd} rejected \`${expression}\`: ${e.code}`);
    console.error(flags.json ? JSON.stringify({ error: e.code, message: e.message }) : e.message);
    return 1;
  }
}

/**
 * Run the CLI when the module is executed directly and exit with its code
 * once pending log writes are flushed.
 */
export async function main(): Promise<void> {
  let code = 1;
  try {
    code = await runCLI(process.argv.slice(2));
  } catch (err) {
    console.error('CLI error:', describeError(err));
  }
  await loggingQueue.drain();
  process.exit(code);
}

if (require.main === module) {
  void main();
}
