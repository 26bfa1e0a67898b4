import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { buildCallGraph } from '../src/analyzer/callGraph/buildCallGraph.js';
import type { CallGraph, FunctionDefinition } from '../src/analyzer/callGraph/types.js';
import { simpleNameOf } from '../src/analyzer/patterns.js';
import type { GrepHit, SearchPattern, SearchTool } from '../src/analyzer/search/types.js';

// Definitions are separated by blank lines: adjacent grep hits merge into one span.
export const CHAIN_SOURCE = [
  'int bar(int x)',
  '{',
  '  return x + 1;',
  '}',
  '',
  'int foo(int y)',
  '{',
  '  return bar(y);',
  '}',
  '',
  'int main(void)',
  '{',
  '  return foo(2);',
  '}',
  '',
].join('\n');

export async function makeTmpDir(prefix = 'calltree-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeCorpus(rootDir: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, text] of Object.entries(files)) {
    const filePath = path.join(rootDir, relPath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, 'utf8');
  }
}

export function def(qualifiedName: string, calls: string[], line = 1, filePath = 'a.c'): FunctionDefinition {
  return {
    qualifiedName,
    simpleName: simpleNameOf(qualifiedName),
    location: { path: filePath, line },
    bodyText: '',
    calls,
  };
}

export function graphOf(definitions: FunctionDefinition[], ignored: string[] = []): CallGraph {
  return buildCallGraph(definitions, new Set(ignored));
}

/** bar <- foo <- main, laid out as in CHAIN_SOURCE. */
export function chainGraph(): CallGraph {
  return graphOf([def('bar', [], 1, 'main.c'), def('foo', ['bar'], 6, 'main.c'), def('main', ['foo'], 11, 'main.c')]);
}

/** Wraps a search tool and counts how often the corpus is listed or searched. */
export class CountingSearchTool implements SearchTool {
  calls = 0;

  constructor(private readonly inner: SearchTool) {}

  get rootDir(): string {
    return this.inner.rootDir;
  }

  listFiles(filenamePattern: string, ignoreGlobs: readonly string[]): Promise<string[]> {
    this.calls += 1;
    return this.inner.listFiles(filenamePattern, ignoreGlobs);
  }

  grep(pattern: SearchPattern, filenamePattern: string, ignoreGlobs: readonly string[]): Promise<GrepHit[]> {
    this.calls += 1;
    return this.inner.grep(pattern, filenamePattern, ignoreGlobs);
  }
}

/** Search tool answering from canned grep hits. */
export class StaticSearchTool implements SearchTool {
  readonly rootDir = '/nonexistent';

  constructor(
    private readonly hits: GrepHit[],
    private readonly files: string[] = [],
  ) {}

  async listFiles(): Promise<string[]> {
    return this.files;
  }

  async grep(): Promise<GrepHit[]> {
    return this.hits;
  }
}

/** Delegates to another search tool; while held, listing files waits for the release. */
export class GatedSearchTool implements SearchTool {
  private gate: Promise<void> = Promise.resolve();

  constructor(private readonly inner: SearchTool) {}

  get rootDir(): string {
    return this.inner.rootDir;
  }

  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return release;
  }

  async listFiles(filenamePattern: string, ignoreGlobs: readonly string[]): Promise<string[]> {
    await this.gate;
    return this.inner.listFiles(filenamePattern, ignoreGlobs);
  }

  grep(pattern: SearchPattern, filenamePattern: string, ignoreGlobs: readonly string[]): Promise<GrepHit[]> {
    return this.inner.grep(pattern, filenamePattern, ignoreGlobs);
  }
}
