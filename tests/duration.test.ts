/**
 * Duration parsing and splitting tests.
 */

import { describe, it, expect } from 'vitest';
import {
  parseSeconds,
  parseTimecode,
  splitDuration,
  sameDuration,
  formatMinutesSeconds,
} from '../src/core/duration/duration.js';

describe('parseTimecode', () => {
  it('parses H:MM:SS.ff', () => {
    expect(parseTimecode('0:02:05.04')).toBeCloseTo(125.04, 6);
    expect(parseTimecode('1:00:00')).toBe(3600);
  });

  it('parses MM:SS.ff', () => {
    expect(parseTimecode('02:05.5')).toBe(125.5);
  });

  it('parses bare seconds', () => {
    expect(parseTimecode('125.25')).toBe(125.25);
    expect(parseTimecode(' 12 ')).toBe(12);
  });

  it('returns null instead of zero for unavailable values', () => {
    expect(parseTimecode('')).toBeNull();
    expect(parseTimecode(null)).toBeNull();
    expect(parseTimecode(undefined)).toBeNull();
    expect(parseTimecode('abc')).toBeNull();
    expect(parseTimecode('1:2:3:4')).toBeNull();
  });
});

describe('parseSeconds', () => {
  it('accepts signed and exponent forms', () => {
    expect(parseSeconds('-5')).toBe(-5);
    expect(parseSeconds('1e2')).toBe(100);
  });

  it('rejects text', () => {
    expect(parseSeconds('25fps')).toBeNull();
    expect(parseSeconds('')).toBeNull();
  });
});

describe('splitDuration', () => {
  it('snaps to frames before splitting', () => {
    expect(splitDuration(125.004, 25, true)).toEqual({ minutes: 2, seconds: 5 });
    expect(splitDuration(10.3, 25, true)).toEqual({ minutes: 0, seconds: 10.32 });
  });

  it('keeps hundredths when not rounding to frames', () => {
    expect(splitDuration(10.3, 25, false)).toEqual({ minutes: 0, seconds: 10.3 });
    expect(splitDuration(90.125, null, false)).toEqual({ minutes: 1, seconds: 30.13 });
  });

  it('carries seconds that round to 60 into minutes', () => {
    expect(splitDuration(59.999, null, false)).toEqual({ minutes: 1, seconds: 0 });
    expect(splitDuration(59.999, 25, true)).toEqual({ minutes: 1, seconds: 0 });
  });

  it('ignores frame rounding without a usable framerate', () => {
    expect(splitDuration(10.3, null, true)).toEqual({ minutes: 0, seconds: 10.3 });
    expect(splitDuration(10.3, 0, true)).toEqual({ minutes: 0, seconds: 10.3 });
  });

  it('clamps negative and non-finite input to zero', () => {
    expect(splitDuration(-3, 25, true)).toEqual({ minutes: 0, seconds: 0 });
    expect(splitDuration(Number.NaN, 25, true)).toEqual({ minutes: 0, seconds: 0 });
  });

  it('always yields seconds below 60 that add back up to the total', () => {
    for (let total = 0; total < 7200; total += 0.37) {
      const { minutes, seconds } = splitDuration(total, null, false);
      expect(Number.isInteger(minutes)).toBe(true);
      expect(seconds).toBeGreaterThanOrEqual(0);
      expect(seconds).toBeLessThan(60);
      expect(Math.abs(minutes * 60 + seconds - total)).toBeLessThanOrEqual(0.0051);
    }
  });

  it('never yields 60 seconds when snapping to common frame rates', () => {
    const rates = [23.976, 24, 25, 29.97, 30, 50, 59.94, 60];
    const violations: string[] = [];

    for (const rate of rates) {
      for (let hundredths = 0; hundredths <= 360000; hundredths++) {
        const total = hundredths / 100;
        const { minutes, seconds } = splitDuration(total, rate, true);
        if (!Number.isInteger(minutes) || seconds < 0 || seconds >= 60) {
          violations.push(`${total}s @ ${rate}: ${minutes}m ${seconds}s`);
        }
      }
    }

    expect(violations).toEqual([]);
  });
});

describe('sameDuration', () => {
  it('compares at hundredth precision', () => {
    expect(sameDuration({ minutes: 1, seconds: 5.001 }, { minutes: 1, seconds: 5 })).toBe(true);
    expect(sameDuration({ minutes: 1, seconds: 5.01 }, { minutes: 1, seconds: 5 })).toBe(false);
    expect(sameDuration({ minutes: 2, seconds: 5 }, { minutes: 1, seconds: 5 })).toBe(false);
  });
});

describe('formatMinutesSeconds', () => {
  it('pads seconds to two digits with two decimals', () => {
    expect(formatMinutesSeconds({ minutes: 2, seconds: 5 })).toBe('2m 05.00s');
    expect(formatMinutesSeconds({ minutes: 0, seconds: 10.32 })).toBe('0m 10.32s');
  });
});
