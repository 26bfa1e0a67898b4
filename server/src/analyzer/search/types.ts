import type { Span } from '../patterns.js';

export type GrepHit = {
  path: string; // root-relative, posix separators
  line: number; // 1-based
  content: string;
};

export type SearchPattern = {
  pcre: string;
  findSpans(text: string): Span[];
};

/** File listing and multiline grep over a source tree, ag-style. */
export interface SearchTool {
  readonly rootDir: string;
  listFiles(filenamePattern: string, ignoreGlobs: readonly string[]): Promise<string[]>;
  grep(pattern: SearchPattern, filenamePattern: string, ignoreGlobs: readonly string[]): Promise<GrepHit[]>;
}
