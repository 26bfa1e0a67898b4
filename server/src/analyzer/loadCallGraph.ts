import { GraphCache, type CacheKey } from './cache/graphCache.js';
import type { CallGraph } from './callGraph/types.js';
import {
  DEFAULT_FILENAME_PATTERN,
  DEFAULT_IGNORE_GLOBS,
  DEFAULT_IGNORED_NAMES,
  DEFAULT_LENGTH_THRESHOLD,
  DEFAULT_TRIVIAL_THRESHOLD,
  DEFAULT_WORKER_GROUPS,
} from './defaults.js';
import { extractCallGraph, type ExtractStats } from './extract/extractFunctions.js';
import { createLogger } from './logger.js';
import { resolveInRoot } from './pathUtils.js';
import { withSanitizedCorpus } from './sanitizer/corpusGuard.js';
import { restoreLeftovers } from './sanitizer/sanitize.js';
import type { SearchTool } from './search/types.js';

const log = createLogger('graph');

export type LoadCallGraphRequest = {
  search: SearchTool;
  extraIgnoredNames?: readonly string[];
  trivialThreshold?: number;
  lengthThreshold?: number;
  filenamePattern?: string;
  ignoreGlobs?: readonly string[];
  workers?: number;
  /** Rebuild even when a matching cache exists. */
  force?: boolean;
};

export type LoadProgress = {
  stage: string;
  percent: number;
};

export type LoadCallGraphOptions = {
  onProgress?: (progress: LoadProgress) => void;
  exit?: (code: number) => void;
};

export type LoadCallGraphResult = {
  graph: CallGraph;
  fromCache: boolean;
  files?: number;
  stats?: ExtractStats;
};

function normalizeThreshold(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : fallback;
}

/**
 * Returns the call graph of the search tool's root: from the cache when its signature
 * matches, otherwise by sanitizing the corpus, extracting, and persisting the result.
 */
export async function loadCallGraph(req: LoadCallGraphRequest, options: LoadCallGraphOptions = {}): Promise<LoadCallGraphResult> {
  const report = (stage: string, percent: number): void => {
    log('%s (%d%%)', stage, percent);
    options.onProgress?.({ stage, percent });
  };

  const rootDir = req.search.rootDir;
  const key: CacheKey = {
    ignoredNames: [...DEFAULT_IGNORED_NAMES, ...(req.extraIgnoredNames ?? [])],
    trivialThreshold: normalizeThreshold(req.trivialThreshold, DEFAULT_TRIVIAL_THRESHOLD),
    lengthThreshold: normalizeThreshold(req.lengthThreshold, DEFAULT_LENGTH_THRESHOLD),
  };
  const filenamePattern = req.filenamePattern ?? DEFAULT_FILENAME_PATTERN;
  const ignoreGlobs = req.ignoreGlobs ?? DEFAULT_IGNORE_GLOBS;

  report('Restoring leftover files', 5);
  await restoreLeftovers(rootDir);

  const cache = new GraphCache(rootDir);
  if (!req.force) {
    report('Reading cache', 10);
    const cached = await cache.load(key);
    if (cached) {
      report('Done', 100);
      return { graph: cached, fromCache: true };
    }
  }

  report('Listing source files', 20);
  const files = (await req.search.listFiles(filenamePattern, ignoreGlobs)).map((rel) => resolveInRoot(rootDir, rel));

  report('Sanitizing sources', 30);
  const result = await withSanitizedCorpus(
    files,
    async () => {
      report('Extracting function definitions', 50);
      return extractCallGraph(req.search, { ...key, filenamePattern, ignoreGlobs });
    },
    { workers: req.workers ?? DEFAULT_WORKER_GROUPS, exit: options.exit },
  );

  report('Writing cache', 90);
  await cache.save(key, result.graph);

  report('Done', 100);
  return { graph: result.graph, fromCache: false, files: files.length, stats: result.stats };
}
