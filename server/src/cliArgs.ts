import path from 'node:path';
import yargs from 'yargs';

import {
  DEFAULT_FILTER,
  DEFAULT_LENGTH_THRESHOLD,
  DEFAULT_MAX_DEPTH,
  DEFAULT_TRIVIAL_THRESHOLD,
  DEFAULT_WORKER_GROUPS,
} from './analyzer/defaults.js';
import { CallTreeError } from './analyzer/errors.js';
import { isSearchEngine, SEARCH_ENGINES, type SearchEngine } from './analyzer/search/index.js';
import type { TreeDirection } from './analyzer/tree/types.js';

export const USAGE = '$0 <name|regex> [filter] [direction] [verbose] [depth]';

export type CliOptions = {
  name: string;
  filter: string;
  direction: TreeDirection;
  verbose: boolean;
  maxDepth: number;
  rootDir: string;
  engine: SearchEngine;
  trivialThreshold: number;
  lengthThreshold: number;
  workers: number;
  ignoreCsv?: string;
  leafKinds: boolean;
};

export type ParseCliOptions = {
  cwd?: string;
  exitProcess?: boolean;
};

function toDirection(value: string | undefined): TreeDirection {
  return value?.trim() === '0' ? 'calling' : 'called';
}

function toVerbose(value: string | undefined): boolean {
  if (value === undefined) return false;
  return Number(value.trim()) !== 0;
}

function toDepth(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_MAX_DEPTH;
  const depth = Number(value);
  if (!Number.isFinite(depth) || depth < 0) {
    throw new CallTreeError('USAGE', `Illegal depth '${value}'`);
  }
  return Math.floor(depth);
}

function toCount(value: number, flag: string, min: number): number {
  if (!Number.isFinite(value) || value < min) {
    throw new CallTreeError('USAGE', `Illegal --${flag} (${value})`);
  }
  return Math.floor(value);
}

/** Parses `calltree` arguments (without the node and script entries). Usage problems throw USAGE errors. */
export function parseCliArgs(args: string[], options: ParseCliOptions = {}): CliOptions {
  const argv = yargs(args)
    .scriptName('calltree')
    .usage(USAGE)
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('root', { type: 'string', describe: 'Corpus root directory', default: options.cwd ?? process.cwd() })
    .option('engine', { type: 'string', choices: SEARCH_ENGINES, describe: 'Search engine', default: 'ag' })
    .option('trivial-threshold', {
      type: 'number',
      describe: 'Names called more often than this are ignored',
      default: DEFAULT_TRIVIAL_THRESHOLD,
    })
    .option('length-threshold', {
      type: 'number',
      describe: 'Names shorter than this are ignored',
      default: DEFAULT_LENGTH_THRESHOLD,
    })
    .option('workers', { type: 'number', describe: 'Sanitizer worker groups', default: DEFAULT_WORKER_GROUPS })
    .option('ignore-csv', { type: 'string', describe: 'CSV file with a name column of extra ignored names' })
    .option('leaf-kind', { type: 'boolean', describe: 'Annotate terminal nodes with their leaf kind', default: false })
    .demandCommand(1, 'missing function name')
    .strictOptions()
    .exitProcess(options.exitProcess ?? true)
    .fail((message: string | undefined, error: Error | undefined) => {
      throw new CallTreeError('USAGE', message ?? error?.message ?? 'Illegal arguments', { cause: error });
    })
    .help()
    .parseSync();

  const [name, filter, direction, verbose, depth] = argv._.map(String);
  if (name === undefined || name === '') {
    throw new CallTreeError('USAGE', 'missing function name');
  }
  const engine: unknown = argv.engine;
  if (!isSearchEngine(engine)) {
    throw new CallTreeError('USAGE', `Illegal --engine '${String(engine)}'`);
  }

  return {
    name,
    filter: filter === undefined || filter === '' ? DEFAULT_FILTER : filter,
    direction: toDirection(direction),
    verbose: toVerbose(verbose),
    maxDepth: toDepth(depth),
    rootDir: path.resolve(options.cwd ?? process.cwd(), argv.root),
    engine,
    trivialThreshold: toCount(argv.trivialThreshold, 'trivial-threshold', 0),
    lengthThreshold: toCount(argv.lengthThreshold, 'length-threshold', 0),
    workers: toCount(argv.workers, 'workers', 1),
    ignoreCsv: argv.ignoreCsv,
    leafKinds: argv.leafKind,
  };
}
