import path from 'node:path';

export function resolveInRoot(rootDir: string, relPath: string): string {
  return path.isAbsolute(relPath) ? relPath : path.resolve(rootDir, relPath);
}
