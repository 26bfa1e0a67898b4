import { simpleNameOf } from '../patterns.js';
import { NameIndex } from './nameIndex.js';
import type { CallerNode, CallGraph, FunctionDefinition } from './types.js';

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export function toCallerNode(def: FunctionDefinition, ignored: ReadonlySet<string>): CallerNode {
  const calleeNames = unique(def.calls.filter((name) => !ignored.has(name)));
  const qualified = new Set(calleeNames);
  const calleeSimpleNames = unique(calleeNames.map(simpleNameOf)).filter((name) => !qualified.has(name));

  return {
    name: def.qualifiedName,
    simpleName: def.simpleName,
    fileInfo: `${def.location.path}:${def.location.line}`,
    calleeNames,
    calleeSimpleNames,
  };
}

/**
 * Files every definition whose name survives `ignored` into both indices:
 * `definitionsOf` by its own name, `callersOf` by each name it calls.
 */
export function buildCallGraph(definitions: readonly FunctionDefinition[], ignored: ReadonlySet<string>): CallGraph {
  const definitionsOf = new NameIndex();
  const callersOf = new NameIndex();

  for (const def of definitions) {
    if (ignored.has(def.qualifiedName)) continue;
    const node = toCallerNode(def, ignored);

    definitionsOf.file(node.name, node);

    const filed = new Set<string>();
    for (const callee of node.calleeNames) {
      callersOf.file(callee, node, filed);
    }
  }

  return { definitionsOf, callersOf };
}
