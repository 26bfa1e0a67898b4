import { AgSearchTool, ensureAgInstalled } from './agSearch.js';
import type { SearchTool } from './types.js';
import { WalkSearchTool } from './walkSearch.js';

export type SearchEngine = 'ag' | 'walk';

export const SEARCH_ENGINES: readonly SearchEngine[] = ['ag', 'walk'];

export function isSearchEngine(value: unknown): value is SearchEngine {
  return value === 'ag' || value === 'walk';
}

export async function createSearchTool(engine: SearchEngine, rootDir: string): Promise<SearchTool> {
  if (engine === 'walk') return new WalkSearchTool(rootDir);
  await ensureAgInstalled();
  return new AgSearchTool(rootDir);
}

export type { GrepHit, SearchPattern, SearchTool } from './types.js';
