import { buildCallGraph } from '../callGraph/buildCallGraph.js';
import type { CallGraph, FunctionDefinition } from '../callGraph/types.js';
import { createLogger } from '../logger.js';
import { captureDefinitionName, findDefinitionSpans, FUNCTION_DEFINITION_PCRE, simpleNameOf } from '../patterns.js';
import type { SearchPattern, SearchTool } from '../search/types.js';
import { extractCallNames } from './callees.js';
import { mergeAdjacentLines } from './mergeLines.js';

const log = createLogger('extract');

export const FUNCTION_DEFINITION_PATTERN: SearchPattern = {
  pcre: FUNCTION_DEFINITION_PCRE,
  findSpans: findDefinitionSpans,
};

export type Thresholds = {
  trivialThreshold: number;
  lengthThreshold: number;
};

export type ExtractOptions = Thresholds & {
  ignoredNames: Iterable<string>;
  filenamePattern: string;
  ignoreGlobs: readonly string[];
};

export type ExtractStats = {
  linesMatched: number;
  spans: number;
  definitions: number;
  definitionsKept: number;
  trivialNames: number;
};

export type ExtractResult = {
  graph: CallGraph;
  ignored: Set<string>;
  stats: ExtractStats;
};

export type ExtractedDefinitions = {
  definitions: FunctionDefinition[];
  /** Calls of every merged span, including spans that yield no definition name. */
  spanCalls: string[][];
  linesMatched: number;
  spans: number;
};

/**
 * Greps the (already sanitized) corpus for definitions, merges multi-line hits, and
 * collects the calls inside each. The first call expression of a span is the definition's
 * own signature, so it is not counted as a callee.
 */
export async function extractDefinitions(
  search: SearchTool,
  options: Pick<ExtractOptions, 'filenamePattern' | 'ignoreGlobs'>,
): Promise<ExtractedDefinitions> {
  const hits = await search.grep(FUNCTION_DEFINITION_PATTERN, options.filenamePattern, options.ignoreGlobs);
  log('extract lines: %d', hits.length);

  const spans = mergeAdjacentLines(hits);
  log('function definition after merge: %d', spans.length);

  const definitions: FunctionDefinition[] = [];
  const spanCalls: string[][] = [];
  for (const span of spans) {
    const [, ...calls] = extractCallNames(span.text);
    spanCalls.push(calls);
    const qualifiedName = captureDefinitionName(span.text);
    if (!qualifiedName) continue;
    definitions.push({
      qualifiedName,
      simpleName: simpleNameOf(qualifiedName),
      location: { path: span.path, line: span.line },
      bodyText: span.text,
      calls,
    });
  }

  return { definitions, spanCalls, linesMatched: hits.length, spans: spans.length };
}

export function countCalls(spanCalls: Iterable<readonly string[]>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const calls of spanCalls) {
    for (const name of calls) counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return counts;
}

/** Names called more often than the trivial threshold, or shorter than the length threshold. */
export function findTrivialNames(counts: ReadonlyMap<string, number>, thresholds: Thresholds): Set<string> {
  const trivial = new Set<string>();
  for (const [name, count] of counts) {
    if (count > thresholds.trivialThreshold || name.length < thresholds.lengthThreshold) trivial.add(name);
  }
  return trivial;
}

export async function extractCallGraph(search: SearchTool, options: ExtractOptions): Promise<ExtractResult> {
  const { definitions, spanCalls, linesMatched, spans } = await extractDefinitions(search, options);

  const trivial = findTrivialNames(countCalls(spanCalls), options);
  const ignored = new Set([...options.ignoredNames, ...trivial]);
  const graph = buildCallGraph(definitions, ignored);

  const stats: ExtractStats = {
    linesMatched,
    spans,
    definitions: definitions.length,
    definitionsKept: definitions.filter((def) => !ignored.has(def.qualifiedName)).length,
    trivialNames: trivial.size,
  };
  log('definitions kept: %d of %d, trivial names: %d', stats.definitionsKept, stats.definitions, stats.trivialNames);
  return { graph, ignored, stats };
}
