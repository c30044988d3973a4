/**
 * Duration utilities for DDR timer sync.
 * Converts playback-device timecode strings to seconds and splits seconds
 * into the minutes/seconds pair the graphics timer fields expect.
 */

// ============================================================================
// Types
// ============================================================================

export interface MinutesSeconds {
  minutes: number;
  /** Fractional seconds, rounded to 2 decimals, always below 60 */
  seconds: number;
}

// ============================================================================
// Constants
// ============================================================================

/** H:MM:SS.ff */
const HOURS_REGEX = /^(\d+):(\d+):(\d+(?:\.\d*)?)$/;

/** MM:SS.ff */
const MINUTES_REGEX = /^(\d+):(\d+(?:\.\d*)?)$/;

/** Plain decimal number, optionally signed, optionally with exponent. */
const NUMERIC_REGEX = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Nudge applied before rounding to hundredths, so that values sitting on a
 * rounding boundary (but stored a hair below it) round up.
 */
const ROUNDING_EPSILON = 1e-9;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a bare numeric string to seconds.
 *
 * @returns Seconds, or null if the text is not a finite number
 */
export function parseSeconds(text: string | null | undefined): number | null {
  if (text === null || text === undefined) {
    return null;
  }

  const trimmed = text.trim();
  if (!NUMERIC_REGEX.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a device timecode to seconds.
 * Supports "H:MM:SS.ff", "MM:SS.ff" and bare numeric seconds.
 *
 * @returns Seconds, or null when the value is unavailable (never zero as a fallback)
 */
export function parseTimecode(text: string | null | undefined): number | null {
  if (text === null || text === undefined) {
    return null;
  }

  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (!trimmed.includes(':')) {
    return parseSeconds(trimmed);
  }

  const hoursMatch = HOURS_REGEX.exec(trimmed);
  if (hoursMatch) {
    const [, hours, minutes, seconds] = hoursMatch;
    return parseInt(hours!, 10) * 3600 + parseInt(minutes!, 10) * 60 + parseFloat(seconds!);
  }

  const minutesMatch = MINUTES_REGEX.exec(trimmed);
  if (minutesMatch) {
    const [, minutes, seconds] = minutesMatch;
    return parseInt(minutes!, 10) * 60 + parseFloat(seconds!);
  }

  return null;
}

// ============================================================================
// Splitting
// ============================================================================

/**
 * Round to 2 decimal places.
 */
export function roundHundredths(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Split a duration into whole minutes and remaining seconds.
 *
 * Negative input is clamped to zero. With `roundToFrames` and a positive
 * framerate the total is first snapped to the nearest frame boundary.
 * Seconds that round up to 60 carry into minutes.
 */
export function splitDuration(
  totalSeconds: number,
  framerate: number | null | undefined,
  roundToFrames: boolean
): MinutesSeconds {
  let total = Number.isFinite(totalSeconds) ? Math.max(0, totalSeconds) : 0;

  if (roundToFrames && framerate !== null && framerate !== undefined && framerate > 0) {
    total = Math.round(total * framerate) / framerate;
  }

  let minutes = Math.floor(total / 60);
  let seconds = roundHundredths(total - minutes * 60 + ROUNDING_EPSILON);

  if (seconds >= 60) {
    minutes += 1;
    seconds = 0;
  }

  return { minutes, seconds };
}

/**
 * Compare two minute/second pairs at hundredth-of-a-second precision.
 */
export function sameDuration(a: MinutesSeconds, b: MinutesSeconds): boolean {
  return a.minutes === b.minutes && roundHundredths(a.seconds) === roundHundredths(b.seconds);
}

/**
 * Format a minute/second pair for logs, e.g. "2m 05.00s".
 */
export function formatMinutesSeconds(value: MinutesSeconds): string {
  return `${value.minutes}m ${value.seconds.toFixed(2).padStart(5, '0')}s`;
}
