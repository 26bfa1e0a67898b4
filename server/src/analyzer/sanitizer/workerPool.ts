import { DEFAULT_WORKER_GROUPS } from '../defaults.js';
import { CallTreeError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { sanitizeFile } from './sanitize.js';

const log = createLogger('workers');

/** Round-robin split into at most numGroups non-empty groups. */
export function groupFiles<T>(items: readonly T[], numGroups: number): T[][] {
  if (!Number.isInteger(numGroups) || numGroups < 1) {
    throw new CallTreeError('USAGE', `Illegal number of worker groups (${numGroups})`);
  }
  if (items.length === 0) return [];

  const count = Math.min(numGroups, items.length);
  const groups: T[][] = Array.from({ length: count }, () => []);
  items.forEach((item, i) => {
    groups[i % count]?.push(item);
  });
  return groups;
}

export type SanitizeCorpusOptions = {
  workers?: number;
  sanitize?: (filePath: string) => Promise<boolean>;
};

/**
 * Sanitizes every file, one async worker per group. Each worker owns its files, so the
 * groups share nothing. Resolves only after every worker has finished, even when one of
 * them fails, so that no rename is still in flight when the caller restores.
 */
export async function sanitizeCorpus(files: readonly string[], options: SanitizeCorpusOptions = {}): Promise<number> {
  const sanitize = options.sanitize ?? sanitizeFile;
  const groups = groupFiles(files, options.workers ?? DEFAULT_WORKER_GROUPS);
  log('sanitizing %d files in %d groups', files.length, groups.length);

  const results = await Promise.allSettled(
    groups.map(async (group) => {
      let sanitized = 0;
      for (const filePath of group) {
        if (await sanitize(filePath)) sanitized += 1;
      }
      return sanitized;
    }),
  );

  let total = 0;
  for (const [i, result] of results.entries()) {
    if (result.status === 'rejected') {
      throw new CallTreeError('WORKER_FAILED', `Sanitize worker ${i} failed: ${errorMessage(result.reason)}`, {
        cause: result.reason,
      });
    }
    total += result.value;
  }
  return total;
}
