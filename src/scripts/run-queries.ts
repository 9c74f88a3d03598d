#!/usr/bin/env node
/**
 * Run SQL templates against Athena (MODE=CLOUD) or a local DuckDB (MODE=LOCAL).
 *
 * Usage, from repo root:
 *   npm run queries -- ddl-run
 *   npm run queries -- run Query01
 *   npm run queries -- run-all --mode LOCAL
 *   npm run queries -- repair-partitions
 *
 * Reads .env.local then .env. Exit codes: 0 success, 1 usage or configuration
 * error, 2 a statement failed or timed out.
 */

import * as dotenv from 'dotenv';
import { loadRunnerConfig, RunnerConfig } from '../config/runnerConfig';
import { Logger } from '../services/core/Logger';
import { createOrchestrator } from '../services/execution/createOrchestrator';
import type { QueryRunner } from '../services/execution/QueryOrchestrator';
import { QueryRunnerError, errorMessage } from '../types/QueryErrors';
import type { ExecutionMode, ExecutionResult } from '../types/QueryTypes';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_QUERY_FAILED = 2;

export type CliCommand =
  | { name: 'ddl-run' }
  | { name: 'run'; query: string }
  | { name: 'run-all' }
  | { name: 'repair-partitions' }
  | { name: 'help' };

export interface CliArgs {
  command: CliCommand;
  mode?: ExecutionMode;
  sqlRoot?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: run-queries <command> [--mode CLOUD|LOCAL] [--sql-root <dir>]

Commands:
  ddl-run              Create every table/view, then repair partitions
  run <name>           Run one query (exact name, else first name starting with it)
  run-all              Run every query in file order, stopping at the first failure
  repair-partitions    Run MSCK REPAIR TABLE for every partitioned table
  help                 Show this message`;

function flagValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let mode: ExecutionMode | undefined;
  let sqlRoot: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--mode') {
      const value = flagValue(argv, i, arg).toUpperCase();
      if (value !== 'CLOUD' && value !== 'LOCAL') {
        throw new UsageError(`--mode must be CLOUD or LOCAL, got ${argv[i + 1]}`);
      }
      mode = value;
      i++;
    } else if (arg === '--sql-root') {
      sqlRoot = flagValue(argv, i, arg);
      i++;
    } else if (arg === '--help' || arg === '-h') {
      positional.unshift('help');
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const name: string | undefined = positional[0];
  const rest = positional.slice(1);
  let command: CliCommand;
  switch (name) {
    case undefined:
      throw new UsageError('No command given');
    case 'help':
      return { command: { name: 'help' }, mode, sqlRoot };
    case 'run':
      if (rest.length !== 1) {
        throw new UsageError('run takes exactly one query name');
      }
      command = { name: 'run', query: rest[0] };
      break;
    case 'ddl-run':
    case 'run-all':
    case 'repair-partitions':
      if (rest.length > 0) {
        throw new UsageError(`${name} takes no arguments`);
      }
      command = { name };
      break;
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }

  return { command, mode, sqlRoot };
}

/**
 * Environment with command-line overrides applied
 */
export function applyOverrides(env: NodeJS.ProcessEnv, args: CliArgs): NodeJS.ProcessEnv {
  return {
    ...env,
    ...(args.mode ? { MODE: args.mode } : {}),
    ...(args.sqlRoot ? { SQL_ROOT: args.sqlRoot } : {}),
  };
}

function formatResult(result: ExecutionResult): string {
  const rows = result.rowCount !== undefined ? ` rows=${result.rowCount}` : '';
  const id = result.executionId ? ` id=${result.executionId}` : '';
  return `${result.status.padEnd(9)} ${result.queryName}${id}${rows} -> ${result.resultLocation}`;
}

export interface CliDeps {
  createOrchestrator: (config: RunnerConfig, logger: Logger) => Promise<QueryRunner>;
  print: (line: string) => void;
  printError: (line: string) => void;
}

const defaultDeps: CliDeps = {
  createOrchestrator,
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
};

/**
 * Run one CLI invocation and return its exit code
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: CliDeps = defaultDeps
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    deps.printError(`${errorMessage(error)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (args.command.name === 'help') {
    deps.print(USAGE);
    return EXIT_OK;
  }

  let config: RunnerConfig;
  try {
    config = loadRunnerConfig(applyOverrides(env, args));
  } catch (error) {
    deps.printError(errorMessage(error));
    return EXIT_USAGE;
  }

  const logger = new Logger('run-queries', { level: config.logLevel });
  let results: ExecutionResult[] = [];

  try {
    const orchestrator = await deps.createOrchestrator(config, logger);
    const command = args.command;

    switch (command.name) {
      case 'ddl-run': {
        const { ddl, repairs } = await orchestrator.runDdl();
        results = [...ddl, ...repairs];
        break;
      }
      case 'run':
        results = [await orchestrator.runQuery(command.query)];
        break;
      case 'run-all':
        results = await orchestrator.runAll();
        break;
      case 'repair-partitions':
        results = await orchestrator.repairPartitions();
        break;
    }
  } catch (error) {
    if (error instanceof QueryRunnerError && (error.error_class === 'EXECUTION' || error.error_class === 'TIMEOUT')) {
      deps.printError(`FAILED ${error.error_code}: ${error.message}`);
      return EXIT_QUERY_FAILED;
    }
    if (error instanceof QueryRunnerError) {
      deps.printError(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }

  results.forEach((result) => deps.print(formatResult(result)));
  deps.print(`${results.length} statement(s) succeeded (${config.mode})`);
  return EXIT_OK;
}

async function main(): Promise<void> {
  dotenv.config({ path: '.env.local' });
  dotenv.config({ path: '.env' });

  process.exitCode = await runCli(process.argv.slice(2));
}

if (require.main === module) {
  main().catch((err) => {
    console.error('run-queries failed:', err);
    process.exit(1);
  });
}
