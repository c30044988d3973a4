/**
 * Subcomposition control and value coercion tests.
 */

import { describe, it, expect } from 'vitest';
import { coerceValue, parseFlag } from '../src/core/control/coerce.js';
import { ControlService, buildTimeControlPayload } from '../src/core/control/control.js';
import { Registry } from '../src/core/registry/registry.js';
import { CommandLog } from '../src/core/events/command-log.js';
import { InvalidArgumentError, NotConfiguredError, NotFoundError } from '../src/core/errors.js';
import { FakeControlApp, StaticConfig, composition, field } from './fakes.js';

describe('coerceValue', () => {
  it('reads numbers for numeric fields', () => {
    expect(coerceValue({ type: 'number' }, '42')).toBe(42);
    expect(coerceValue({ type: 'Slider' }, '0.5')).toBe(0.5);
    expect(coerceValue({ type: 'range' }, ' -3 ')).toBe(-3);
  });

  it('keeps unparseable numeric input as text', () => {
    expect(coerceValue({ type: 'number' }, '12abc')).toBe('12abc');
    expect(coerceValue({ type: 'number' }, '1e3')).toBe('1e3');
  });

  it('reads booleans for checkbox fields', () => {
    expect(coerceValue({ type: 'checkbox' }, 'YES')).toBe(true);
    expect(coerceValue({ type: 'toggle' }, '0')).toBe(false);
  });

  it('sends text unchanged for other types or when forced', () => {
    expect(coerceValue({ type: 'text' }, '42')).toBe('42');
    expect(coerceValue({ type: 'number' }, '42', true)).toBe('42');
  });
});

describe('parseFlag', () => {
  it('falls back only when absent', () => {
    expect(parseFlag(undefined, true)).toBe(true);
    expect(parseFlag('', false)).toBe(false);
    expect(parseFlag('off', true)).toBe(false);
    expect(parseFlag('on', false)).toBe(true);
  });
});

describe('buildTimeControlPayload', () => {
  it('writes the countdown length before the clock', () => {
    expect(buildTimeControlPayload('Clock', true, 1.9, 1700000000000, 10)).toEqual({
      'Countdown Seconds': '10',
      Clock: { UTC: 1700000000000, isRunning: true, value: 1 },
    });
  });

  it('omits the countdown length when not given', () => {
    expect(buildTimeControlPayload('Clock', false, 0, 5)).toEqual({
      Clock: { UTC: 5, isRunning: false, value: 0 },
    });
  });
});

describe('ControlService', () => {
  async function setup(apps: Record<string, string> = { Main: 'test-token' }) {
    const app = new FakeControlApp([
      composition('lt', 'Lower Third', [field('Name'), field('Count', 'number')]),
      composition('clk', 'Clock', [field('Timer', 'timecontrol')]),
    ]);
    const registry = new Registry(app);
    await registry.rebuildAll(apps);
    const commandLog = new CommandLog(10, () => new Date(2024, 0, 2, 3, 4, 5));
    const control = new ControlService({
      registry,
      config: new StaticConfig({ singular: { apps } }),
      controlApp: app,
      commandLog,
      now: () => 1700000000000,
    });
    return { app, control, commandLog };
  }

  it('animates by slug or id', async () => {
    const { app, control, commandLog } = await setup();

    const result = await control.animate('lower-third', 'In');
    await control.animate('clk', 'Out');

    expect(result).toEqual({ status: 200, id: 'lt', app: 'Main', slug: 'lower-third', response: '{"success":true}' });
    expect(app.patches.map((p) => p.items)).toEqual([
      [{ subCompositionId: 'lt', state: 'In' }],
      [{ subCompositionId: 'clk', state: 'Out' }],
    ]);
    expect(commandLog.recent()).toEqual([
      '[2024-01-02 03:04:05] Control PATCH: items=1 -> 200',
      '[2024-01-02 03:04:05] IN: Main/lower-third (lt)',
      '[2024-01-02 03:04:05] Control PATCH: items=1 -> 200',
      '[2024-01-02 03:04:05] OUT: Main/clock (clk)',
    ]);
  });

  it('coerces field values to the declared type', async () => {
    const { control } = await setup();

    const result = await control.setField('lower-third', 'Count', '7');

    expect(result.sent).toEqual([{ subCompositionId: 'lt', payload: { Count: 7 } }]);
  });

  it('rejects unknown fields and subcompositions', async () => {
    const { control } = await setup();

    await expect(control.setField('lower-third', 'Nope', '1')).rejects.toThrow(
      'Field not found on Main/lower-third: Nope'
    );
    await expect(control.animate('missing', 'In')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('starts a time control with the current time', async () => {
    const { app, control } = await setup();

    const result = await control.timeControl('clock', { field: 'Timer', seconds: 30 });

    expect(result.sent).toEqual({
      'Countdown Seconds': '30',
      Timer: { UTC: 1700000000000, isRunning: true, value: 0 },
    });
    expect(app.patches[0]?.items[0]?.subCompositionId).toBe('clk');
  });

  it('refuses time control on other field types', async () => {
    const { control } = await setup();

    await expect(control.timeControl('lower-third', { field: 'Name' })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });

  it('sends raw items to the named or first app', async () => {
    const { app, control } = await setup({ Main: 'test-token', Backup: 'test-token-2' });

    await control.sendRaw([{ subCompositionId: 'lt', state: 'In' }]);
    await control.sendRaw([{ subCompositionId: 'lt', state: 'Out' }], 'Backup');

    expect(app.patches.map((p) => p.token)).toEqual(['test-token', 'test-token-2']);
  });

  it('needs at least one app for raw control', async () => {
    const { control } = await setup({});

    await expect(control.sendRaw([])).rejects.toBeInstanceOf(NotConfiguredError);
  });

  it('lists example command URLs', async () => {
    const { control } = await setup();

    const catalogue = control.catalogue('http://host:3113/api/control');

    expect(Object.keys(catalogue)).toEqual(['Main/lower-third', 'Main/clock']);
    expect(catalogue['Main/clock']).toEqual({
      id: 'clk',
      name: 'Clock',
      app: 'Main',
      inUrl: 'http://host:3113/api/control/Main/clock/in',
      outUrl: 'http://host:3113/api/control/Main/clock/out',
      fields: {
        Timer: {
          setUrl: 'http://host:3113/api/control/Main/clock/set?field=Timer&value=VALUE',
          timecontrolStartUrl: 'http://host:3113/api/control/Main/clock/timecontrol?field=Timer&run=true&value=0',
          timecontrolStopUrl: 'http://host:3113/api/control/Main/clock/timecontrol?field=Timer&run=false&value=0',
          startWithCountdownUrl:
            'http://host:3113/api/control/Main/clock/timecontrol?field=Timer&run=true&value=0&seconds=10',
        },
      },
    });
  });
});
