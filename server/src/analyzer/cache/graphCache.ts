import fs from 'node:fs/promises';
import path from 'node:path';

import { NameIndex } from '../callGraph/nameIndex.js';
import type { CallGraph } from '../callGraph/types.js';
import { CallTreeError, errorMessage } from '../errors.js';
import { isRegularFile, readJsonFile, readTextIfExists, touchFiles, writeJsonFile } from '../io.js';
import { createLogger } from '../logger.js';

const log = createLogger('cache');

export type CacheKey = {
  ignoredNames: readonly string[];
  trivialThreshold: number;
  lengthThreshold: number;
};

export type CachePaths = {
  signature: string;
  calling: string;
  called: string;
};

export function cacheSignature(key: CacheKey): string {
  const names = [...new Set(key.ignoredNames)].sort();
  return `${names.join(',')}|${key.trivialThreshold}|${key.lengthThreshold}`;
}

async function parseIndexFile(filePath: string): Promise<NameIndex> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new CallTreeError('CACHE_CORRUPT', `Fail to parse '${filePath}': ${errorMessage(error)}`, { cause: error });
  }
  try {
    return NameIndex.fromJSON(raw);
  } catch (error) {
    throw new CallTreeError('CACHE_CORRUPT', `Fail to parse '${filePath}': ${errorMessage(error)}`, { cause: error });
  }
}

/** Built graphs persisted next to the corpus, one file set per threshold pair. */
export class GraphCache {
  constructor(private readonly dir: string) {}

  paths(key: CacheKey): CachePaths {
    const suffix = `.${Math.trunc(key.trivialThreshold)}.${Math.trunc(key.lengthThreshold)}`;
    return {
      signature: path.join(this.dir, `.calltree_ignored${suffix}`),
      calling: path.join(this.dir, `.calltree_calling${suffix}`),
      called: path.join(this.dir, `.calltree_called${suffix}`),
    };
  }

  /** The cached graph for `key`, or null on a miss. A present but unreadable graph is fatal. */
  async load(key: CacheKey): Promise<CallGraph | null> {
    const paths = this.paths(key);
    const saved = await readTextIfExists(paths.signature);
    if (saved === null || saved !== cacheSignature(key)) {
      log('miss: %s', saved === null ? 'no signature' : 'signature changed');
      return null;
    }
    if (!(await isRegularFile(paths.calling)) || !(await isRegularFile(paths.called))) {
      log('miss: graph files absent');
      return null;
    }

    const definitionsOf = await parseIndexFile(paths.calling);
    const callersOf = await parseIndexFile(paths.called);
    await touchFiles([paths.signature, paths.calling, paths.called]);
    log('hit: %d definition keys, %d caller keys', definitionsOf.size, callersOf.size);
    return { definitionsOf, callersOf };
  }

  async save(key: CacheKey, graph: CallGraph): Promise<void> {
    const paths = this.paths(key);
    await writeJsonFile(paths.calling, graph.definitionsOf.toJSON());
    await writeJsonFile(paths.called, graph.callersOf.toJSON());
    // the signature goes last: graph files without a matching signature are never read
    await fs.writeFile(paths.signature, cacheSignature(key), 'utf8');
  }
}
