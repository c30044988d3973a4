/**
 * Command log tests.
 */

import { describe, it, expect, vi } from 'vitest';
import { CommandLog, formatTimestamp } from '../src/core/events/command-log.js';

describe('formatTimestamp', () => {
  it('formats local time with zero padding', () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
  });
});

describe('CommandLog', () => {
  const clock = () => new Date(2024, 2, 1, 14, 2, 11);

  it('records formatted lines and notifies listeners', () => {
    const log = new CommandLog(5, clock);
    const listener = vi.fn();
    log.on('entry', listener);

    const line = log.record('IN', 'Main/lower-third (lt)');

    expect(line).toBe('[2024-03-01 14:02:11] IN: Main/lower-third (lt)');
    expect(listener).toHaveBeenCalledWith(line);
  });

  it('keeps only the newest lines', () => {
    const log = new CommandLog(3, clock);
    for (let i = 1; i <= 5; i++) {
      log.record('Sync', `DDR ${i}`);
    }

    expect(log.size).toBe(3);
    expect(log.recent()).toEqual([
      '[2024-03-01 14:02:11] Sync: DDR 3',
      '[2024-03-01 14:02:11] Sync: DDR 4',
      '[2024-03-01 14:02:11] Sync: DDR 5',
    ]);
    expect(log.recent(1)).toEqual(['[2024-03-01 14:02:11] Sync: DDR 5']);
    expect(log.recent(0)).toEqual([]);
  });

  it('clears', () => {
    const log = new CommandLog(3, clock);
    log.record('Timer', 'DDR 1 start');
    log.clear();

    expect(log.size).toBe(0);
  });
});
