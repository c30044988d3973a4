/**
 * HTTP API tests against an in-process server with stand-in remotes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { pino } from 'pino';
import { createHttpApp } from '../src/web/server.js';
import { createAppContext, rebuildRegistry, type AppContext } from '../src/context.js';
import { ConfigStore } from '../src/core/config/store.js';
import { parseConfig } from '../src/core/config/schema.js';
import { fakeFetch, type RecordedRequest } from './fakes.js';

const MODEL = JSON.stringify([
  {
    id: 'ddr1-comp',
    name: 'DDR 1',
    model: [
      { id: 'DDR1 Min', type: 'number' },
      { id: 'DDR1 Sec', type: 'number' },
      { id: 'DDR1 Timer', type: 'timer' },
    ],
  },
  { id: 'lt', name: 'Lower Third', model: [{ id: 'Name', type: 'text' }] },
]);

const DDR_XML = '<ddr_timecode><ddr index="1" file_duration="00:01:30.00" clip_framerate="25" /></ddr_timecode>';

function remotes(request: RecordedRequest): { status?: number; body: string } {
  if (request.url.endsWith('/model')) {
    return { body: MODEL };
  }
  if (request.url.endsWith('/control')) {
    return { body: '{"success":true}' };
  }
  if (request.url.includes('/v1/dictionary')) {
    return { body: DDR_XML };
  }
  return { status: 404, body: 'not found' };
}

const RAW_CONFIG = {
  singular: { apps: { Main: 'test-token' } },
  tricaster: { enabled: true, host: '10.0.0.5' },
  timerSync: {
    token: 'test-token',
    fields: { 1: { min: 'DDR1 Min', sec: 'DDR1 Sec', timer: 'DDR1 Timer' } },
  },
};

interface Harness {
  context: AppContext;
  requests: RecordedRequest[];
  url: (path: string) => string;
  close: () => Promise<void>;
}

async function startHarness(raw: unknown = RAW_CONFIG): Promise<Harness> {
  const config = parseConfig(raw);
  const store = new ConfigStore(config);
  const { fetchImpl, requests } = fakeFetch(remotes);
  const context = createAppContext(store, pino({ level: 'silent' }), {
    fetchImpl,
    sleep: async () => undefined,
  });
  await rebuildRegistry(context);

  const server: Server = createServer(createHttpApp(config.web, context, context.logger));
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address: AddressInfo | string | null = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  return {
    context,
    requests,
    url: (path) => `http://127.0.0.1:${port}/api${path}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('HTTP API', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await startHarness();
  });

  afterEach(async () => {
    await harness.close();
  });

  it('reports health', async () => {
    const response = await fetch(harness.url('/health'));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', registry: 2, autoSync: false });
  });

  it('syncs one DDR', async () => {
    const response = await fetch(harness.url('/sync/1'), { method: 'POST' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      ok: true,
      slot: 1,
      durationSeconds: 90,
      minutes: 1,
      seconds: 30,
      framerate: 25,
      roundMode: 'frames',
    });

    const patch = harness.requests.find((r) => r.url.endsWith('/control'));
    expect(patch?.body).toBe('[{"subCompositionId":"ddr1-comp","payload":{"DDR1 Min":1,"DDR1 Sec":30}}]');
  });

  it('answers configuration problems with 400 and the error kind', async () => {
    const response = await fetch(harness.url('/sync/9'));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'No timer fields configured for DDR 9',
      kind: 'not_configured',
    });
  });

  it('rejects unknown timer commands', async () => {
    const response = await fetch(harness.url('/timer/1/rewind'), { method: 'POST' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Unknown timer command: rewind', kind: 'invalid_argument' });
  });

  it('restarts a timer', async () => {
    const response = await fetch(harness.url('/timer/1/restart'));

    expect(await response.json()).toEqual({ ok: true, slot: 1, action: 'restart' });
    expect(harness.requests.filter((r) => r.url.endsWith('/control')).map((r) => r.body)).toEqual([
      '[{"subCompositionId":"ddr1-comp","payload":{"DDR1 Timer":{"command":"pause"}}}]',
      '[{"subCompositionId":"ddr1-comp","payload":{"DDR1 Timer":{"command":"reset"}}}]',
    ]);
  });

  it('animates a subcomposition by slug', async () => {
    const response = await fetch(harness.url('/control/Main/lower-third/in'));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ id: 'lt', app: 'Main', slug: 'lower-third' });
  });

  it('answers unknown subcompositions with 404', async () => {
    const response = await fetch(harness.url('/control/Main/nope/in'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: 'Subcomposition not found: nope in app Main',
      kind: 'not_found',
    });
  });

  it('validates raw control bodies', async () => {
    const response = await postJson(harness.url('/singular/control'), [{ state: 'In' }]);

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ kind: 'invalid_argument' });
  });

  it('saves timer sync settings and returns warnings', async () => {
    const response = await postJson(harness.url('/timer-sync/config'), {
      token: 'test-token',
      fields: { '2': { min: 'DDR2 Min' } },
    });

    expect(await response.json()).toEqual({
      ok: true,
      message: 'Timer sync configuration saved',
      warnings: ["DDR 2 maps only one of 'min' and 'sec'; duration sync will fail for it."],
    });

    const saved = await fetch(harness.url('/timer-sync/config'));
    expect(await saved.json()).toEqual({
      token: 'test-token',
      roundMode: 'frames',
      fields: { '2': { min: 'DDR2 Min' } },
    });
  });

  it('lists recent command log lines', async () => {
    await (await fetch(harness.url('/sync/1'))).json();

    const response = await fetch(harness.url('/events'));
    expect(await response.json()).toEqual({
      events: expect.arrayContaining([
        expect.stringMatching(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] Sync: DDR 1 => 1m 30\.00s$/),
      ]),
    });
  });

  it('answers unknown paths with 404', async () => {
    const response = await fetch(harness.url('/nothing-here'));

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });
});

describe('HTTP API authentication', () => {
  it('requires basic auth when enabled', async () => {
    const harness = await startHarness({
      ...RAW_CONFIG,
      web: { auth: { enabled: true, username: 'operator', password: 'test-secret' } },
    });

    try {
      const denied = await fetch(harness.url('/health'));
      expect(denied.status).toBe(401);
      expect(denied.headers.get('www-authenticate')).toBe('Basic realm="DDR Timer Sync"');

      const allowed = await fetch(harness.url('/health'), {
        headers: { Authorization: `Basic ${Buffer.from('operator:test-secret').toString('base64')}` },
      });
      expect(allowed.status).toBe(200);
    } finally {
      await harness.close();
    }
  });
});
