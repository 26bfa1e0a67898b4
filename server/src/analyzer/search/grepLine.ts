import { CallTreeError } from '../errors.js';
import type { Span } from '../patterns.js';
import type { GrepHit } from './types.js';

// Content keeps a trailing \r from CRLF sources.
const GREP_LINE = /^([^:]+):(\d+):([\s\S]*)$/;

export function parseGrepLine(raw: string): GrepHit {
  const match = GREP_LINE.exec(raw);
  const [, filePath, lineText, content] = match ?? [];
  if (filePath === undefined || lineText === undefined || content === undefined) {
    throw new CallTreeError('MALFORMED_GREP_LINE', `Cannot split grep output into file, line, content: ${raw}`);
  }
  return { path: filePath, line: Number(lineText), content };
}

/** Every line touched by a span, once each, in file order. */
export function hitsForSpans(filePath: string, text: string, spans: Span[]): GrepHit[] {
  if (spans.length === 0) return [];

  const lines = text.split('\n');
  const lineStarts: number[] = [];
  let offset = 0;
  for (const line of lines) {
    lineStarts.push(offset);
    offset += line.length + 1;
  }

  const lineIndexOf = (pos: number): number => {
    let lo = 0;
    let hi = lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((lineStarts[mid] ?? 0) <= pos) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  };

  const hits: GrepHit[] = [];
  let lastEmitted = -1;
  for (const span of spans) {
    const first = Math.max(lineIndexOf(span.start), lastEmitted + 1);
    const last = lineIndexOf(Math.max(span.start, span.end - 1));
    for (let i = first; i <= last; i += 1) {
      hits.push({ path: filePath, line: i + 1, content: lines[i] ?? '' });
      lastEmitted = i;
    }
  }
  return hits;
}
