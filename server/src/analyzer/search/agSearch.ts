import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { CallTreeError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { parseGrepLine } from './grepLine.js';
import type { GrepHit, SearchPattern, SearchTool } from './types.js';

const execFileAsync = promisify(execFile);
const log = createLogger('search:ag');

const AG_MAX_BUFFER = 1024 * 1024 * 1024;

function ignoreArgs(ignoreGlobs: readonly string[]): string[] {
  return ignoreGlobs.flatMap((glob) => ['--ignore', glob]);
}

// ag exits with 1 when nothing matched; that is an empty result, not a failure.
function isNoMatchExit(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 1;
}

export async function ensureAgInstalled(): Promise<void> {
  try {
    await execFileAsync('ag', ['--version']);
  } catch (error) {
    throw new CallTreeError(
      'SEARCH_TOOL_MISSING',
      'ag is missing, please install ag at first, refer to https://github.com/ggreer/the_silver_searcher',
      { cause: error },
    );
  }
}

/** The Silver Searcher as the search collaborator. Patterns go through as PCRE. */
export class AgSearchTool implements SearchTool {
  constructor(readonly rootDir: string) {}

  private async run(args: string[]): Promise<string[]> {
    log('ag %s', args.join(' '));
    try {
      const { stdout } = await execFileAsync('ag', args, { cwd: this.rootDir, maxBuffer: AG_MAX_BUFFER });
      return stdout.split('\n').filter((line) => line.length > 0);
    } catch (error) {
      if (isNoMatchExit(error)) return [];
      throw new CallTreeError('IO', `ag ${args.join(' ')} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listFiles(filenamePattern: string, ignoreGlobs: readonly string[]): Promise<string[]> {
    return this.run(['--nocolor', ...ignoreArgs(ignoreGlobs), '-g', filenamePattern]);
  }

  async grep(pattern: SearchPattern, filenamePattern: string, ignoreGlobs: readonly string[]): Promise<GrepHit[]> {
    const lines = await this.run([
      '--nocolor',
      '--nogroup',
      '--nobreak',
      ...ignoreArgs(ignoreGlobs),
      '-G',
      filenamePattern,
      pattern.pcre,
    ]);
    return lines.map(parseGrepLine);
  }
}
