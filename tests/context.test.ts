/**
 * Configuration change handling tests.
 */

import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { createAppContext, handleConfigChange } from '../src/context.js';
import { ConfigStore } from '../src/core/config/store.js';
import { parseConfig } from '../src/core/config/schema.js';
import { fakeFetch } from './fakes.js';

const MODEL = JSON.stringify([{ id: 'lt', name: 'Lower Third', model: [{ id: 'Name', type: 'text' }] }]);

function setup() {
  const store = new ConfigStore(parseConfig({ singular: { apps: { Main: 'test-token' } } }));
  const { fetchImpl, requests } = fakeFetch(() => ({ body: MODEL }));
  const context = createAppContext(store, pino({ level: 'silent' }), { fetchImpl });
  return { store, context, requests };
}

describe('handleConfigChange', () => {
  it('rebuilds the registry when control apps change', async () => {
    const { store, context } = setup();
    const config = await store.update((draft) => {
      draft.singular.apps['Second'] = 'test-token-2';
    });

    await handleConfigChange(context, { config, changed: ['singular'] });

    expect(context.registry.appNames()).toEqual(['Main', 'Second']);
    expect(context.commandLog.recent(1)[0]).toMatch(/Registry: Total: 2 subcompositions from 2 app\(s\)$/);
  });

  it('drops field resolutions when timer settings change', async () => {
    const { store, context } = setup();
    await context.fieldCache.resolveFields('test-token', ['Name']);
    expect(context.fieldCache.size).toBe(1);

    await handleConfigChange(context, { config: store.get(), changed: ['timerSync'] });

    expect(context.fieldCache.size).toBe(0);
  });

  it('starts and stops auto-sync with its setting', async () => {
    const { store, context } = setup();

    const enabled = await store.update((draft) => {
      draft.timerSync.autoSync.enabled = true;
    });
    await handleConfigChange(context, { config: enabled, changed: ['timerSync'] });
    expect(context.autoSync.running).toBe(true);

    const disabled = await store.update((draft) => {
      draft.timerSync.autoSync.enabled = false;
    });
    await handleConfigChange(context, { config: disabled, changed: ['timerSync'] });
    expect(context.autoSync.running).toBe(false);
  });
});
