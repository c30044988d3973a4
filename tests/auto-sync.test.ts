/**
 * Auto-sync loop tests.
 */

import { describe, it, expect } from 'vitest';
import { AutoSyncLoop } from '../src/core/sync/auto-sync.js';
import { SyncOrchestrator } from '../src/core/sync/orchestrator.js';
import { FieldResolutionCache } from '../src/core/sync/field-cache.js';
import { FakeControlApp, FakePlayback, StaticConfig, TOKEN, composition, field } from './fakes.js';

function setup(raw: unknown) {
  const config = new StaticConfig(raw);
  const app = new FakeControlApp([
    composition('ddr1-comp', 'DDR 1', [field('DDR1 Min', 'number'), field('DDR1 Sec', 'number')]),
  ]);
  const playback = new FakePlayback();
  const orchestrator = new SyncOrchestrator({
    config,
    controlApp: app,
    playback,
    fieldCache: new FieldResolutionCache(app),
  });
  const loop = new AutoSyncLoop({
    config,
    orchestrator,
    now: () => new Date('2024-03-01T12:00:00.000Z'),
  });
  return { config, app, playback, orchestrator, loop };
}

const ENABLED = {
  tricaster: { enabled: true, host: '127.0.0.1' },
  timerSync: {
    token: TOKEN,
    fields: { 1: { min: 'DDR1 Min', sec: 'DDR1 Sec' }, 2: { timer: 'DDR2 Timer' } },
    autoSync: { enabled: true, intervalSeconds: 2 },
  },
};

describe('AutoSyncLoop.pollOnce', () => {
  it('patches only when the duration changes', async () => {
    const { app, playback, loop } = setup(ENABLED);
    playback.setDurations(
      1,
      { seconds: 10, framerate: null },
      { seconds: 10, framerate: null },
      { seconds: 12.5, framerate: null }
    );

    expect(await loop.pollOnce()).toEqual({ skipped: false, applied: [1], errors: [] });
    expect(await loop.pollOnce()).toEqual({ skipped: false, applied: [], errors: [] });
    expect(await loop.pollOnce()).toEqual({ skipped: false, applied: [1], errors: [] });

    expect(app.patches).toHaveLength(2);
    expect(loop.status()).toEqual({
      enabled: true,
      running: false,
      intervalSeconds: 2,
      lastSync: '2024-03-01T12:00:00.000Z',
      lastError: null,
      cachedValues: { '1': { minutes: 0, seconds: 12.5 } },
    });
  });

  it('only polls slots mapped to both minutes and seconds', async () => {
    const { playback, loop } = setup(ENABLED);
    playback.setDurations(1, { seconds: 10, framerate: null });

    await loop.pollOnce();

    expect(playback.reads).toEqual([1]);
  });

  it('skips the pass without a device host or token', async () => {
    const noHost = setup({ ...ENABLED, tricaster: { enabled: true } });
    expect(await noHost.loop.pollOnce()).toEqual({ skipped: true, applied: [], errors: [] });

    const noToken = setup({ ...ENABLED, timerSync: { ...ENABLED.timerSync, token: undefined } });
    expect(await noToken.loop.pollOnce()).toEqual({ skipped: true, applied: [], errors: [] });
    expect(noToken.playback.reads).toEqual([]);
  });

  it('records failures instead of throwing', async () => {
    const { loop } = setup(ENABLED);

    const result = await loop.pollOnce();

    expect(result.errors).toEqual(['DDR 1: no duration queued for DDR 1']);
    expect(loop.status().lastError).toBe('DDR 1: no duration queued for DDR 1');
    expect(loop.status().lastSync).toBeNull();
  });
});

describe('AutoSyncLoop lifecycle', () => {
  it('starts once and stops promptly', async () => {
    const { playback, loop } = setup(ENABLED);
    playback.setDurations(1, { seconds: 10, framerate: null });

    expect(loop.start()).toBe(true);
    expect(loop.start()).toBe(false);
    expect(loop.running).toBe(true);

    await loop.stop();

    expect(loop.running).toBe(false);
    expect(playback.reads.length).toBeGreaterThanOrEqual(1);
  });

  it('can be restarted after stopping', async () => {
    const { playback, loop } = setup(ENABLED);
    playback.setDurations(1, { seconds: 10, framerate: null });

    loop.start();
    await loop.stop();
    expect(loop.start()).toBe(true);
    await loop.stop();

    expect(loop.running).toBe(false);
  });

  it('exits by itself when auto-sync is disabled', async () => {
    const { loop } = setup({ ...ENABLED, timerSync: { ...ENABLED.timerSync, autoSync: { enabled: false } } });

    loop.start();
    await loop.stop();

    expect(loop.running).toBe(false);
    expect(loop.status().enabled).toBe(false);
  });
});
