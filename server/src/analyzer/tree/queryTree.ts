import type { NameIndex } from '../callGraph/nameIndex.js';
import type { CallGraph } from '../callGraph/types.js';
import { DEFAULT_FILTER, DEFAULT_MAX_DEPTH } from '../defaults.js';
import { simpleNameOf } from '../patterns.js';
import type { LeafKind, TreeDirection, TreeNode } from './types.js';

export type TreeQuery = {
  name: string;
  filter?: string | RegExp;
  maxDepth?: number;
  direction?: TreeDirection;
};

type Step = {
  name: string;
  fileInfo: string;
};

type WalkContext = {
  index: NameIndex;
  expand: (simpleName: string) => Step[];
  filter: RegExp;
  maxDepth: number;
};

function toFilter(filter: string | RegExp | undefined): RegExp {
  if (filter instanceof RegExp) return new RegExp(filter.source, filter.flags.replace(/[gy]/gu, ''));
  return new RegExp(filter === undefined || filter === '' ? DEFAULT_FILTER : filter);
}

function callersOfStep(graph: CallGraph): (simpleName: string) => Step[] {
  return (simpleName) => graph.callersOf.get(simpleName).map((node) => ({ name: node.name, fileInfo: node.fileInfo }));
}

function calleesOfStep(graph: CallGraph): (simpleName: string) => Step[] {
  return (simpleName) =>
    graph.definitionsOf.get(simpleName).flatMap((node) =>
      node.calleeNames.map((callee) => ({
        name: callee,
        fileInfo: graph.definitionsOf.get(simpleNameOf(callee))[0]?.fileInfo ?? '',
      })),
    );
}

function terminalKind(
  ctx: WalkContext,
  steps: readonly Step[],
  simpleName: string,
  level: number,
  onPath: ReadonlySet<string>,
): LeafKind | null {
  if (steps.length === 0) return 'outmost';
  if (level >= ctx.maxDepth) return 'deep';
  if (onPath.has(simpleName)) return 'recursive';
  return null;
}

/**
 * Depth-first expansion. A name with nothing to expand is `outmost`. A terminal node
 * survives only when its name matches the filter; an inner node survives only when one
 * of its children did.
 */
function walk(ctx: WalkContext, name: string, fileInfo: string, parentLevel: number, onPath: Set<string>): TreeNode | null {
  const level = parentLevel + 1;
  const simpleName = simpleNameOf(name);

  const steps = ctx.expand(simpleName);
  const leaf = terminalKind(ctx, steps, simpleName, level, onPath);
  if (leaf) {
    return ctx.filter.test(name) ? { name, fileInfo, children: [], leaf } : null;
  }

  onPath.add(simpleName);
  const children: TreeNode[] = [];
  for (const step of steps) {
    const child = walk(ctx, step.name, step.fileInfo, level, onPath);
    if (child) children.push(child);
  }
  onPath.delete(simpleName);

  return children.length > 0 ? { name, fileInfo, children, leaf: 'none' } : null;
}

/**
 * Builds the caller (or callee) tree for `query.name`. An exact key of the direction's
 * index roots the tree at that name; anything else is a pattern, and every matching key
 * becomes a child of a synthetic root named after the pattern.
 */
export function buildCallTree(graph: CallGraph, query: TreeQuery): TreeNode {
  const direction = query.direction ?? 'called';
  const ctx: WalkContext = {
    index: direction === 'called' ? graph.callersOf : graph.definitionsOf,
    expand: direction === 'called' ? callersOfStep(graph) : calleesOfStep(graph),
    filter: toFilter(query.filter),
    maxDepth: query.maxDepth ?? DEFAULT_MAX_DEPTH,
  };

  if (ctx.index.has(query.name)) {
    const anchored = walk(ctx, query.name, '', 0, new Set());
    return anchored ?? { name: query.name, fileInfo: '', children: [], leaf: 'none' };
  }

  const pattern = new RegExp(query.name);
  const children = ctx.index
    .keys()
    .filter((key) => pattern.test(key))
    .sort()
    .map((key) => walk(ctx, key, '', 0, new Set()))
    .filter((node): node is TreeNode => node !== null);

  return { name: query.name, fileInfo: '', children, leaf: 'none' };
}
