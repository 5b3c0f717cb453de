/**
 * snowmatch command line
 *
 * Usage:
 *   snowmatch reconcile --config ./snowmatch.json --input ./prices.csv --output ./results.json
 *   snowmatch promote --config ./snowmatch.json --input ./results.json --dry-run
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { CollaboratorError, Logger, MIN_REGISTRY_CONFIDENCE } from '@snowmatch/core';
import { formatBatchResult, formatPromotionResult, ReconciliationError } from '@snowmatch/reconciliation';
import { loadConfig } from './config.js';
import type { Env } from './config.js';
import { createResolver, openStores } from './runtime.js';
import type { Runtime } from './runtime.js';
import { reconcileCommand } from './commands/reconcile.js';
import type { ResultFormat } from './commands/reconcile.js';
import { promoteCommand } from './commands/promote.js';

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  env: Env;
  cwd: string;
}

export const USAGE = [
  'Usage:',
  '  snowmatch reconcile --config <config.json> --input <prices.csv> [--output <results.csv|results.json>]',
  '                      [--format csv|json] [--promote]',
  '  snowmatch promote   --config <config.json> --input <results.json> [--min-confidence <0.5-1>] [--dry-run]',
  '',
  'Example config.json:',
  JSON.stringify(
    {
      logging: { level: 'info', format: 'text' },
      stores: { type: 'file', catalogPath: './catalog.json', registryPath: './modifiers.ndjson' },
      resolver: { type: 'anthropic', apiKey: '${ANTHROPIC_API_KEY}' },
      priceList: { delimiter: ';' },
    },
    null,
    2
  ),
].join('\n');

export function processIo(): CliIo {
  return {
    stdout: (text) => {
      process.stdout.write(`${text}\n`);
    },
    stderr: (text) => {
      process.stderr.write(`${text}\n`);
    },
    env: process.env,
    cwd: process.cwd(),
  };
}

function parseCommandArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: 'string', short: 'c' },
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      format: { type: 'string' },
      promote: { type: 'boolean' },
      'min-confidence': { type: 'string' },
      'dry-run': { type: 'boolean' },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

function parseFormat(value: string | undefined): ResultFormat | undefined {
  if (value === undefined || value === 'csv' || value === 'json') return value;
  throw new Error(`--format must be csv or json (got ${value})`);
}

function parseMinConfidence(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < MIN_REGISTRY_CONFIDENCE || parsed > 1) {
    throw new Error(`--min-confidence must be a number between ${MIN_REGISTRY_CONFIDENCE} and 1 (got ${value})`);
  }
  return parsed;
}

function describeError(error: unknown): string {
  if (error instanceof CollaboratorError || error instanceof ReconciliationError) {
    return error.toActionableMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one command and return the process exit code. Results go to
 * stdout; logs and errors go to stderr.
 */
export async function run(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  const [command, ...rest] = argv;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    io.stderr(USAGE);
    return command === undefined ? 1 : 0;
  }
  if (command !== 'reconcile' && command !== 'promote') {
    io.stderr(`Unknown command: ${command}\n\n${USAGE}`);
    return 1;
  }

  let values: ReturnType<typeof parseCommandArgs>;
  let format: ResultFormat | undefined;
  let minConfidence: number | undefined;
  try {
    values = parseCommandArgs(rest);
    format = parseFormat(values.format);
    minConfidence = parseMinConfidence(values['min-confidence']);
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 1;
  }

  if (!values.config || !values.input) {
    io.stderr(`${command} requires --config and --input\n\n${USAGE}`);
    return 1;
  }

  const sink = (line: string) => io.stderr(line);
  let logger = new Logger({ sink });
  let runtime: Runtime | null = null;

  try {
    const config = await loadConfig(values.config, io.env, io.cwd);
    logger = new Logger({ level: config.logging.level, format: config.logging.format, sink });
    runtime = await openStores(config.stores, logger);

    const input = resolve(io.cwd, values.input);

    if (command === 'reconcile') {
      const outcome = await reconcileCommand(
        {
          input,
          output: values.output === undefined ? undefined : resolve(io.cwd, values.output),
          format,
          promote: values.promote ?? false,
        },
        config,
        runtime,
        createResolver(config.resolver),
        logger
      );
      io.stdout(formatBatchResult(outcome.result));
      if (outcome.promotion) {
        io.stdout(formatPromotionResult(outcome.promotion));
      }
    } else {
      const dryRun = values['dry-run'] ?? false;
      const result = await promoteCommand({ input, minConfidence, dryRun }, config, runtime, logger);
      io.stdout(formatPromotionResult(result, dryRun));
    }

    return 0;
  } catch (error) {
    logger.error(`${command} failed`, { error });
    io.stderr(describeError(error));
    return 1;
  } finally {
    await runtime?.close();
  }
}
