import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';

export type WalkOptions = {
  suffixes?: string[];
  ignoreDirNames?: string[];
};

/** Depth-first listing of regular files under rootDir, sorted by absolute path. */
export async function walkFiles(rootDir: string, options: WalkOptions = {}): Promise<string[]> {
  const suffixes = options.suffixes;
  const ignoreDirNames = new Set(options.ignoreDirNames ?? []);

  const results: string[] = [];
  const stack: string[] = [rootDir];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) continue;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch {
      // unreadable directories are skipped, same as the search tools do
      continue;
    }

    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (ignoreDirNames.has(entry.name)) continue;
        stack.push(fullPath);
        continue;
      }

      if (!entry.isFile()) continue;
      if (suffixes && !suffixes.some((suffix) => entry.name.endsWith(suffix))) continue;
      results.push(fullPath);
    }
  }

  return results.sort();
}
