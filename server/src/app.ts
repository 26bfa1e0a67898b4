import cors from 'cors';
import express, { type Request } from 'express';

import { DEFAULT_FILTER, DEFAULT_MAX_DEPTH } from './analyzer/defaults.js';
import { CallTreeError, errorMessage } from './analyzer/errors.js';
import { formatTree } from './analyzer/tree/formatTree.js';
import { buildCallTree } from './analyzer/tree/queryTree.js';
import type { TreeDirection } from './analyzer/tree/types.js';
import { GraphJobManager, toSseDataLine } from './graphJobManager.js';
import type { GraphService } from './graphService.js';

export type AppDeps = {
  graphs: GraphService;
  jobs?: GraphJobManager;
};

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' ? value : undefined;
}

function toFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  const v = value.trim().toLowerCase();
  return v !== '' && v !== '0' && v !== 'false';
}

function toDirection(value: string | undefined): TreeDirection {
  if (value === undefined || value === '' || value === 'called' || value === '1') return 'called';
  if (value === 'calling' || value === '0') return 'calling';
  throw new CallTreeError('USAGE', `Illegal direction '${value}'`);
}

function toDepth(value: string | undefined): number {
  if (value === undefined || value === '') return DEFAULT_MAX_DEPTH;
  const depth = Number(value);
  if (!Number.isFinite(depth) || depth < 0) throw new CallTreeError('USAGE', `Illegal depth '${value}'`);
  return Math.floor(depth);
}

function isBadInput(error: unknown): boolean {
  return error instanceof SyntaxError || (error instanceof CallTreeError && error.code === 'USAGE');
}

export function createApp(deps: AppDeps): express.Express {
  const { graphs } = deps;
  const jobs = deps.jobs ?? new GraphJobManager(graphs);
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/calltree', async (req, res) => {
    try {
      const name = queryString(req, 'name') ?? '';
      if (!name) throw new CallTreeError('USAGE', 'name must not be empty');
      const query = {
        name,
        filter: queryString(req, 'filter') || DEFAULT_FILTER,
        direction: toDirection(queryString(req, 'direction')),
        maxDepth: toDepth(queryString(req, 'depth')),
      };
      // compile the patterns before waiting on the graph
      new RegExp(query.name);
      new RegExp(query.filter);

      const graph = await graphs.getGraph();
      const tree = buildCallTree(graph, query);
      const lines = formatTree(tree, {
        verbose: toFlag(queryString(req, 'verbose')),
        leafKinds: toFlag(queryString(req, 'leafKind')),
      });
      res.json({ ok: true, lines, tree });
    } catch (error) {
      res.status(isBadInput(error) ? 400 : 500).json({ ok: false, error: errorMessage(error) });
    }
  });

  app.post('/api/graph/jobs', (_req, res) => {
    const snapshot = jobs.start();
    if (!snapshot) {
      res.status(409).json({ ok: false, error: 'A graph build is already running, try again later' });
      return;
    }
    res.json({ ok: true, jobId: snapshot.jobId });
  });

  app.get('/api/graph/jobs/:jobId', (req, res) => {
    const jobId = req.params.jobId;
    const job = jobs.get(jobId);
    if (!job) {
      res.status(404).json({ ok: false, error: `Unknown jobId=${jobId}` });
      return;
    }
    res.json({ ok: true, job });
  });

  app.get('/api/graph/jobs/:jobId/events', (req, res) => {
    const jobId = req.params.jobId;
    const latest = jobs.get(jobId);
    if (!latest) {
      res.status(404).json({ ok: false, error: `Unknown jobId=${jobId}` });
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    res.write(toSseDataLine(latest));
    if (latest.status !== 'running') {
      res.end();
      return;
    }

    const ping = setInterval(() => {
      if (!res.writableEnded) res.write(': ping\n\n');
    }, 15_000);
    ping.unref();

    const unsubscribe = jobs.subscribe(jobId, (snapshot) => {
      if (res.writableEnded) return;
      res.write(toSseDataLine(snapshot));
      if (snapshot.status !== 'running') {
        clearInterval(ping);
        res.end();
      }
    });

    req.on('close', () => {
      clearInterval(ping);
      unsubscribe?.();
    });
  });

  return app;
}
