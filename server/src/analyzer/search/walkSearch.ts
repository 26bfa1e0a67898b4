import fg from 'fast-glob';
import fs from 'node:fs/promises';
import path from 'node:path';

import { CallTreeError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { hitsForSpans } from './grepLine.js';
import type { GrepHit, SearchPattern, SearchTool } from './types.js';

const log = createLogger('search:walk');

/** ag matches ignore globs against names at any depth; fast-glob wants them spelled out. */
export function toFastGlobIgnore(ignoreGlobs: readonly string[]): string[] {
  return ignoreGlobs.flatMap((glob) => [`**/${glob}`, `**/${glob}/**`]);
}

/** In-process search: fast-glob for listing, the pattern's own scanner for matching. */
export class WalkSearchTool implements SearchTool {
  constructor(readonly rootDir: string) {}

  async listFiles(filenamePattern: string, ignoreGlobs: readonly string[]): Promise<string[]> {
    const filenameRe = new RegExp(filenamePattern);
    const entries = await fg('**/*', {
      cwd: this.rootDir,
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: false,
      ignore: toFastGlobIgnore(ignoreGlobs),
    });
    return entries.filter((entry) => filenameRe.test(entry)).sort();
  }

  async grep(pattern: SearchPattern, filenamePattern: string, ignoreGlobs: readonly string[]): Promise<GrepHit[]> {
    const files = await this.listFiles(filenamePattern, ignoreGlobs);
    const hits: GrepHit[] = [];

    for (const relPath of files) {
      let text: string;
      try {
        text = await fs.readFile(path.join(this.rootDir, relPath), 'utf8');
      } catch (error) {
        throw new CallTreeError('IO', `Fail to open '${relPath}' for reading: ${errorMessage(error)}`, { cause: error });
      }
      hits.push(...hitsForSpans(relPath, text, pattern.findSpans(text)));
    }

    log('grep over %d files: %d lines', files.length, hits.length);
    return hits;
  }
}
