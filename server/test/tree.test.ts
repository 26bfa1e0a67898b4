import { describe, expect, it } from 'vitest';

import { formatTree } from '../src/analyzer/tree/formatTree.js';
import { buildCallTree } from '../src/analyzer/tree/queryTree.js';
import type { TreeNode } from '../src/analyzer/tree/types.js';
import { chainGraph, def, graphOf } from './fixtures.js';

function deepest(node: TreeNode, level = 1): { node: TreeNode; level: number } {
  const [first] = node.children;
  return first ? deepest(first, level + 1) : { node, level };
}

describe('buildCallTree (called direction)', () => {
  it('walks callers up to the outmost function', () => {
    const tree = buildCallTree(chainGraph(), { name: 'bar' });
    expect(tree).toEqual({
      name: 'bar',
      fileInfo: '',
      leaf: 'none',
      children: [
        {
          name: 'foo',
          fileInfo: 'main.c:6',
          leaf: 'none',
          children: [{ name: 'main', fileInfo: 'main.c:11', leaf: 'outmost', children: [] }],
        },
      ],
    });
  });

  it('stops at a function already on the path', () => {
    const graph = graphOf([def('ping', ['pong']), def('pong', ['ping'])]);
    const lines = formatTree(buildCallTree(graph, { name: 'ping' }), { leafKinds: true });
    expect(lines).toEqual(['ping', '└── pong', '    └── ping (recursive)']);
  });

  it('marks the node at the depth bound as deep', () => {
    const defs = Array.from({ length: 20 }, (_, i) => def(`fn${i + 1}`, [`fn${i}`], i + 1));
    const tree = buildCallTree(graphOf(defs), { name: 'fn0', maxDepth: 5 });
    const { node, level } = deepest(tree);
    expect(level).toBe(5);
    expect(node.name).toBe('fn4');
    expect(node.leaf).toBe('deep');
  });

  it('keeps only paths whose terminal matches the filter', () => {
    const graph = chainGraph();
    expect(formatTree(buildCallTree(graph, { name: 'bar', filter: 'mai' }))).toEqual(['bar', '└── foo', '    └── main']);
    expect(formatTree(buildCallTree(graph, { name: 'bar', filter: 'xyz' }))).toEqual(['bar']);
  });

  it('prunes an inner node whose terminals all fail the filter', () => {
    const graph = graphOf([def('leaf', []), def('a', ['leaf']), def('b', ['leaf']), def('top', ['a'])]);
    const tree = buildCallTree(graph, { name: 'leaf', filter: '^top$' });
    expect(formatTree(tree)).toEqual(['leaf', '└── a', '    └── top']);
  });

  it('treats a name that is not a key as a pattern over all keys', () => {
    const lines = formatTree(buildCallTree(chainGraph(), { name: 'ba|fo' }));
    expect(lines).toEqual(['ba|fo', '├── bar', '│   └── foo', '│       └── main', '└── foo', '    └── main']);
  });

  it('returns a bare root when nothing matches', () => {
    expect(buildCallTree(chainGraph(), { name: 'nothere' })).toEqual({
      name: 'nothere',
      fileInfo: '',
      leaf: 'none',
      children: [],
    });
  });
});

describe('buildCallTree (calling direction)', () => {
  it('walks callees down to functions that call nothing', () => {
    const lines = formatTree(buildCallTree(chainGraph(), { name: 'main', direction: 'calling' }), {
      verbose: true,
      leafKinds: true,
    });
    expect(lines).toEqual(['main', '└── foo\t[main.c:6]', '    └── bar\t[main.c:1] (outmost)']);
  });

  it('leaves the location of an undefined callee empty', () => {
    const graph = graphOf([def('main', ['external_call'], 3)]);
    const tree = buildCallTree(graph, { name: 'main', direction: 'calling' });
    expect(tree.children).toEqual([{ name: 'external_call', fileInfo: '', leaf: 'outmost', children: [] }]);
  });
});

describe('formatTree', () => {
  it('draws siblings, last children and verbose locations', () => {
    const root: TreeNode = {
      name: 'root',
      fileInfo: '',
      leaf: 'none',
      children: [
        {
          name: 'a',
          fileInfo: 'x.c:1',
          leaf: 'none',
          children: [{ name: 'a1', fileInfo: 'x.c:9', leaf: 'outmost', children: [] }],
        },
        { name: 'b', fileInfo: 'y.c:2', leaf: 'deep', children: [] },
      ],
    };

    expect(formatTree(root)).toEqual(['root', '├── a', '│   └── a1', '└── b']);
    expect(formatTree(root, { verbose: true })).toEqual([
      'root',
      '├── a\t[x.c:1]',
      '│   └── a1\t[x.c:9]',
      '└── b\t[y.c:2]',
    ]);
    expect(formatTree(root, { leafKinds: true })).toEqual(['root', '├── a', '│   └── a1 (outmost)', '└── b (deep)']);
  });
});
