import { CallTreeError } from '../errors.js';
import { simpleNameOf } from '../patterns.js';
import type { CallerNode } from './types.js';

export type SerializedNameIndex = {
  nodes: CallerNode[];
  keys: Record<string, number[]>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function parseCallerNode(raw: unknown, index: number): CallerNode {
  if (
    !isRecord(raw) ||
    typeof raw.name !== 'string' ||
    typeof raw.simpleName !== 'string' ||
    typeof raw.fileInfo !== 'string' ||
    !isStringArray(raw.calleeNames) ||
    !isStringArray(raw.calleeSimpleNames)
  ) {
    throw new CallTreeError('CACHE_CORRUPT', `Malformed caller node #${index}`);
  }
  return {
    name: raw.name,
    simpleName: raw.simpleName,
    fileInfo: raw.fileInfo,
    calleeNames: raw.calleeNames,
    calleeSimpleNames: raw.calleeSimpleNames,
  };
}

/**
 * Caller nodes keyed by name, where every node is filed under its qualified name and
 * also under the trailing simple name when that spelling differs. A node is never filed
 * twice under the same key by one `file` sequence.
 */
export class NameIndex {
  private readonly entries = new Map<string, CallerNode[]>();

  /**
   * Files `node` under `qualifiedName` and its simple alias. Pass the same `filed` set
   * across calls to keep one node from landing twice under a shared alias.
   */
  file(qualifiedName: string, node: CallerNode, filed: Set<string> = new Set()): void {
    if (!filed.has(qualifiedName)) {
      this.append(qualifiedName, node);
      filed.add(qualifiedName);
    }
    const simpleName = simpleNameOf(qualifiedName);
    if (simpleName !== qualifiedName && !filed.has(simpleName)) {
      this.append(simpleName, node);
      filed.add(simpleName);
    }
  }

  private append(key: string, node: CallerNode): void {
    const list = this.entries.get(key) ?? [];
    list.push(node);
    this.entries.set(key, list);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): readonly CallerNode[] {
    return this.entries.get(name) ?? [];
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  toJSON(): SerializedNameIndex {
    const ids = new Map<CallerNode, number>();
    const nodes: CallerNode[] = [];
    const keys: Record<string, number[]> = {};

    for (const [key, list] of this.entries) {
      keys[key] = list.map((node) => {
        let id = ids.get(node);
        if (id === undefined) {
          id = nodes.length;
          ids.set(node, id);
          nodes.push(node);
        }
        return id;
      });
    }
    return { nodes, keys };
  }

  static fromJSON(raw: unknown): NameIndex {
    if (!isRecord(raw) || !Array.isArray(raw.nodes) || !isRecord(raw.keys)) {
      throw new CallTreeError('CACHE_CORRUPT', 'Serialized name index lacks nodes[] or keys{}');
    }

    const nodes = raw.nodes.map(parseCallerNode);
    const index = new NameIndex();
    for (const [key, ids] of Object.entries(raw.keys)) {
      if (!Array.isArray(ids)) throw new CallTreeError('CACHE_CORRUPT', `Key '${key}' does not map to a list`);
      for (const id of ids) {
        const node = typeof id === 'number' ? nodes[id] : undefined;
        if (!node) throw new CallTreeError('CACHE_CORRUPT', `Key '${key}' refers to unknown node ${String(id)}`);
        index.append(key, node);
      }
    }
    return index;
  }
}
