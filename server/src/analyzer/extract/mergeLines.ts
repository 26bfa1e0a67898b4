import { CallTreeError } from '../errors.js';
import type { GrepHit } from '../search/types.js';

export type MergedSpan = {
  path: string;
  line: number; // first line of the span
  text: string;
};

function assertWellFormed(hit: GrepHit, index: number): void {
  if (!hit.path || !Number.isInteger(hit.line) || hit.line < 1 || typeof hit.content !== 'string') {
    throw new CallTreeError(
      'MALFORMED_GREP_LINE',
      `Grep result #${index} is not a file, line, content triple: ${JSON.stringify(hit)}`,
    );
  }
}

/**
 * Joins grep hits that sit on consecutive lines of the same file, so a definition that
 * spans several physical lines comes back as one piece of text.
 */
export function mergeAdjacentLines(hits: readonly GrepHit[]): MergedSpan[] {
  const merged: MergedSpan[] = [];
  let current: MergedSpan | null = null;
  let lastLine = 0;

  for (const [index, hit] of hits.entries()) {
    assertWellFormed(hit, index);
    if (current && current.path === hit.path && lastLine + 1 === hit.line) {
      current.text = `${current.text}\n${hit.content}`;
      lastLine = hit.line;
      continue;
    }
    if (current) merged.push(current);
    current = { path: hit.path, line: hit.line, text: hit.content };
    lastLine = hit.line;
  }

  if (current) merged.push(current);
  return merged;
}
