/**
 * Command-line flags: --debug/-d, --print/-p, --status/-s, --help/-h
 * and the process entry: flags → .env → config → pool → run → exit code
 */

import dotenv from 'dotenv';
import { resolve } from 'node:path';
import type { Pool } from 'pg';
import { loadConfig, type DatabaseConfig, type MailConfig } from './config.js';
import { ConfigError, InventoryCheckError } from './errors.js';
import { createPool } from './lib/db.js';
import type { FetchLike } from './services/catalog.service.js';
import { createNotifier, type Notifier } from './services/notifier.service.js';
import { run, type RunOptions } from './services/orchestrator.service.js';

export const USAGE = `Usage: inventory-check [options]

Fetch catalog stock, store today's snapshot and email changes.

Options:
  -d, --debug   show debug output, do not store or email
  -p, --print   print the current stock table
  -s, --status  print the most recent stored snapshot only
  -h, --help    show this help`;

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: RunOptions };

type Flag = keyof RunOptions | 'help';

const SHORT = new Map<string, Flag>([
  ['d', 'debug'],
  ['p', 'printOutput'],
  ['s', 'status'],
  ['h', 'help'],
]);

const LONG = new Map<string, Flag>([
  ['--debug', 'debug'],
  ['--print', 'printOutput'],
  ['--status', 'status'],
  ['--help', 'help'],
]);

export function parseArgs(argv: string[]): CliCommand {
  const options: RunOptions = { debug: false, printOutput: false, status: false };
  let help = false;

  const set = (flag: Flag): void => {
    if (flag === 'help') help = true;
    else options[flag] = true;
  };

  for (const arg of argv) {
    const long = LONG.get(arg);
    if (long) {
      set(long);
      continue;
    }
    if (/^-[a-z]+$/i.test(arg)) {
      for (const ch of arg.slice(1)) {
        const short = SHORT.get(ch);
        if (!short) throw new ConfigError(`Unknown option: -${ch}`);
        set(short);
      }
      continue;
    }
    throw new ConfigError(`Unexpected argument: ${arg}`);
  }

  return help ? { kind: 'help' } : { kind: 'run', options };
}

export interface MainDeps {
  createPool: (config: DatabaseConfig) => Pool;
  createNotifier: (config: MailConfig) => Notifier;
  /** Fills the environment from .env before the config is read */
  loadEnv: () => void;
  fetchImpl?: FetchLike;
  now?: () => Date;
  log: (text: string) => void;
  error: (text: string) => void;
}

const defaultDeps: MainDeps = {
  createPool,
  createNotifier: (config) => createNotifier(config),
  loadEnv: () => {
    // .env lives in the directory the job is started from
    dotenv.config({ path: resolve(process.cwd(), '.env') });
  },
  log: (text) => console.log(text),
  error: (text) => console.error(text),
};

/** Runs the job and returns the process exit code; never throws */
export async function main(
  argv: string[],
  env: Record<string, string | undefined>,
  overrides: Partial<MainDeps> = {}
): Promise<number> {
  const deps: MainDeps = { ...defaultDeps, ...overrides };
  try {
    return await execute(argv, env, deps);
  } catch (err) {
    if (err instanceof InventoryCheckError) {
      deps.error(`[inventory-check] ${err.stage} failed: ${err.message}`);
    } else {
      deps.error(`[inventory-check] Error: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
    }
    return 1;
  }
}

async function execute(
  argv: string[],
  env: Record<string, string | undefined>,
  deps: MainDeps
): Promise<number> {
  const command = parseArgs(argv);
  if (command.kind === 'help') {
    deps.log(USAGE);
    return 0;
  }

  deps.loadEnv();
  const config = loadConfig(env);

  const { options } = command;
  const pool = deps.createPool(config.database);
  try {
    if (!options.debug) deps.log('[inventory-check] Starting');
    const summary = await run(options, {
      config,
      pool,
      notifier: deps.createNotifier(config.mail),
      fetchImpl: deps.fetchImpl,
      now: deps.now,
      write: deps.log,
    });
    if (summary.mode !== 'debug') {
      deps.log(`[inventory-check] Done. mode=${summary.mode} records=${summary.records}`);
    }
    return 0;
  } finally {
    await pool.end();
  }
}
