import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { WalkSearchTool } from '../src/analyzer/search/walkSearch.js';
import { createApp } from '../src/app.js';
import { GraphJobManager, type GraphJobSnapshot } from '../src/graphJobManager.js';
import { GraphService } from '../src/graphService.js';
import { CHAIN_SOURCE, GatedSearchTool, makeTmpDir, writeCorpus } from './fixtures.js';

type JsonBody = Record<string, unknown>;

let server: Server;
let baseUrl: string;
let jobs: GraphJobManager;
let search: GatedSearchTool;

async function getJson(url: string, init?: RequestInit): Promise<{ status: number; body: JsonBody }> {
  const res = await fetch(`${baseUrl}${url}`, init);
  const body: unknown = await res.json();
  if (typeof body !== 'object' || body === null) throw new Error(`non-object body from ${url}`);
  return { status: res.status, body: { ...body } };
}

async function waitForJob(jobId: string): Promise<GraphJobSnapshot> {
  for (let i = 0; i < 200; i += 1) {
    const job = jobs.get(jobId);
    if (job && job.status !== 'running') return job;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(`job ${jobId} did not finish`);
}

beforeEach(async () => {
  const dir = await makeTmpDir();
  await writeCorpus(dir, { 'main.c': CHAIN_SOURCE });
  search = new GatedSearchTool(new WalkSearchTool(dir));
  const graphs = new GraphService({ search });
  jobs = new GraphJobManager(graphs);
  const app = createApp({ graphs, jobs });
  server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('GET /api/calltree', () => {
  it('answers health checks', async () => {
    expect(await getJson('/api/health')).toEqual({ status: 200, body: { ok: true } });
  });

  it('renders the caller tree with locations', async () => {
    const { status, body } = await getJson('/api/calltree?name=bar&verbose=1');
    expect(status).toBe(200);
    expect(body.ok).toBe(true);
    expect(body.lines).toEqual(['bar', '└── foo\t[main.c:6]', '    └── main\t[main.c:11]']);
  });

  it('renders the callee tree with leaf kinds', async () => {
    const { body } = await getJson('/api/calltree?name=main&direction=calling&leafKind=true');
    expect(body.lines).toEqual(['main', '└── foo', '    └── bar (outmost)']);
  });

  it('rejects a missing name, a bad pattern and a bad direction', async () => {
    expect(await getJson('/api/calltree')).toEqual({ status: 400, body: { ok: false, error: 'name must not be empty' } });
    expect((await getJson('/api/calltree?name=%28')).status).toBe(400);
    expect(await getJson('/api/calltree?name=bar&direction=sideways')).toEqual({
      status: 400,
      body: { ok: false, error: "Illegal direction 'sideways'" },
    });
  });
});

describe('graph jobs', () => {
  it('rebuilds the graph in the background', async () => {
    const { status, body } = await getJson('/api/graph/jobs', { method: 'POST' });
    expect(status).toBe(200);
    const jobId = String(body.jobId);

    const job = await waitForJob(jobId);
    expect(job.status).toBe('done');
    expect(job.result).toMatchObject({ fromCache: false, files: 1, definitionKeys: 3, callerKeys: 2 });

    expect(await getJson(`/api/graph/jobs/${jobId}`)).toMatchObject({ status: 200, body: { ok: true, job: { status: 'done' } } });

    const events = await fetch(`${baseUrl}/api/graph/jobs/${jobId}/events`);
    expect(events.headers.get('content-type')).toBe('text/event-stream; charset=utf-8');
    const text = await events.text();
    expect(text.startsWith('data: ')).toBe(true);
    expect(JSON.parse(text.slice('data: '.length))).toMatchObject({ jobId, status: 'done', percent: 100 });
  });

  it('streams progress until the build finishes', async () => {
    const release = search.hold();
    const { body } = await getJson('/api/graph/jobs', { method: 'POST' });
    const jobId = String(body.jobId);

    const events = await fetch(`${baseUrl}/api/graph/jobs/${jobId}/events`);
    release();
    const frames = (await events.text())
      .split('\n\n')
      .filter((frame) => frame.startsWith('data: '))
      .map((frame): unknown => JSON.parse(frame.slice('data: '.length)));

    expect(frames.length).toBeGreaterThan(1);
    expect(frames[0]).toMatchObject({ jobId, status: 'running' });
    expect(frames.at(-1)).toMatchObject({ jobId, status: 'done', percent: 100 });
  });

  it('refuses a second build while one is running', async () => {
    const release = search.hold();
    const first = jobs.start();
    if (!first) throw new Error('first build did not start');

    expect(await getJson('/api/graph/jobs', { method: 'POST' })).toEqual({
      status: 409,
      body: { ok: false, error: 'A graph build is already running, try again later' },
    });
    release();
    expect((await waitForJob(first.jobId)).status).toBe('done');
  });

  it('answers 404 for unknown jobs', async () => {
    expect((await getJson('/api/graph/jobs/nope')).status).toBe(404);
    expect((await getJson('/api/graph/jobs/nope/events')).status).toBe(404);
  });
});
