import type { CallGraph } from './analyzer/callGraph/types.js';
import { loadCallGraph, type LoadCallGraphResult, type LoadProgress } from './analyzer/loadCallGraph.js';
import type { SearchTool } from './analyzer/search/types.js';

export type GraphServiceConfig = {
  search: SearchTool;
  extraIgnoredNames?: readonly string[];
  trivialThreshold?: number;
  lengthThreshold?: number;
  workers?: number;
};

/**
 * One in-memory graph per server, loaded on first use and replaced by each rebuild.
 * Loads never overlap: a rebuild waits for the load before it, since both rewrite the corpus.
 */
export class GraphService {
  private graph: Promise<CallGraph> | null = null;

  constructor(private readonly config: GraphServiceConfig) {}

  get rootDir(): string {
    return this.config.search.rootDir;
  }

  getGraph(): Promise<CallGraph> {
    if (this.graph) return this.graph;
    const graph = loadCallGraph(this.config).then((result) => result.graph);
    this.track(graph);
    return graph;
  }

  rebuild(onProgress?: (progress: LoadProgress) => void): Promise<LoadCallGraphResult> {
    const previous = this.graph;
    const pending = (async () => {
      if (previous) await previous.catch(() => null);
      return loadCallGraph({ ...this.config, force: true }, { onProgress });
    })();
    this.track(pending.then((result) => result.graph));
    return pending;
  }

  private track(graph: Promise<CallGraph>): void {
    this.graph = graph;
    // a failed load is retried by the next caller
    void graph.catch(() => {
      if (this.graph === graph) this.graph = null;
    });
  }
}
