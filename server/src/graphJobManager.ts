import { randomUUID } from 'node:crypto';

import { errorMessage } from './analyzer/errors.js';
import type { ExtractStats } from './analyzer/extract/extractFunctions.js';
import type { LoadCallGraphResult } from './analyzer/loadCallGraph.js';
import { createLogger } from './analyzer/logger.js';
import type { GraphService } from './graphService.js';

const log = createLogger('jobs');

export type GraphJobStatus = 'running' | 'done' | 'error';

export type GraphJobResult = {
  fromCache: boolean;
  files?: number;
  definitionKeys: number;
  callerKeys: number;
  stats?: ExtractStats;
};

export type GraphJobSnapshot = {
  jobId: string;
  status: GraphJobStatus;
  stage: string;
  percent: number;
  result?: GraphJobResult;
  error?: string;
};

export type GraphJobListener = (snapshot: GraphJobSnapshot) => void;

type GraphJob = {
  snapshot: GraphJobSnapshot;
  listeners: Set<GraphJobListener>;
  finishedAt: number | null;
};

export const FINISHED_JOB_TTL_MS = 60 * 60 * 1000;

export function toSseDataLine(snapshot: GraphJobSnapshot): string {
  return `data: ${JSON.stringify(snapshot)}\n\n`;
}

function summarize(result: LoadCallGraphResult): GraphJobResult {
  return {
    fromCache: result.fromCache,
    files: result.files,
    definitionKeys: result.graph.definitionsOf.size,
    callerKeys: result.graph.callersOf.size,
    stats: result.stats,
  };
}

/**
 * Background graph rebuilds, at most one at a time. Progress of the running rebuild goes
 * to every subscriber of its job; finished jobs stay queryable for FINISHED_JOB_TTL_MS.
 */
export class GraphJobManager {
  private readonly jobs = new Map<string, GraphJob>();
  private running: GraphJob | null = null;

  constructor(
    private readonly graphs: GraphService,
    private readonly now: () => number = Date.now,
  ) {}

  /** Starts a rebuild and returns its first snapshot, or null while another rebuild runs. */
  start(): GraphJobSnapshot | null {
    if (this.running) return null;
    this.prune();

    const job: GraphJob = {
      snapshot: { jobId: randomUUID(), status: 'running', stage: 'Job created', percent: 0 },
      listeners: new Set(),
      finishedAt: null,
    };
    this.jobs.set(job.snapshot.jobId, job);
    this.running = job;

    const created = { ...job.snapshot };
    void this.run(job);
    return created;
  }

  get(jobId: string): GraphJobSnapshot | null {
    const job = this.jobs.get(jobId);
    return job ? { ...job.snapshot } : null;
  }

  /**
   * Calls `listener` with every later snapshot of the job, up to and including the
   * finished one. Returns the unsubscribe function, or null for an unknown job.
   */
  subscribe(jobId: string, listener: GraphJobListener): (() => void) | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    job.listeners.add(listener);
    return () => {
      job.listeners.delete(listener);
    };
  }

  private async run(job: GraphJob): Promise<void> {
    try {
      const result = await this.graphs.rebuild(({ stage, percent }) => this.publish(job, { stage, percent }));
      this.publish(job, { status: 'done', stage: 'Done', percent: 100, result: summarize(result) });
    } catch (error) {
      log('job %s failed: %s', job.snapshot.jobId, errorMessage(error));
      this.publish(job, { status: 'error', error: errorMessage(error) || 'Graph build failed' });
    }
  }

  private publish(job: GraphJob, patch: Partial<Omit<GraphJobSnapshot, 'jobId'>>): void {
    job.snapshot = { ...job.snapshot, ...patch };
    const listeners = [...job.listeners];

    if (job.snapshot.status !== 'running') {
      job.finishedAt = this.now();
      job.listeners.clear();
      if (this.running === job) this.running = null;
    }

    const snapshot = { ...job.snapshot };
    for (const listener of listeners) listener(snapshot);
  }

  private prune(): void {
    const now = this.now();
    for (const [jobId, job] of this.jobs) {
      if (job.finishedAt !== null && now - job.finishedAt >= FINISHED_JOB_TTL_MS) this.jobs.delete(jobId);
    }
  }
}
